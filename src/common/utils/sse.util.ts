import { Logger } from '@nestjs/common';
import { isRecord } from './object.util';

const DATA_PREFIX = 'data: ';

const logger = new Logger('SSETransformer');

/**
 * Flattens a CloudCode envelope: every top-level key except `response`, then
 * every key of the nested `response` object, nested keys winning. Payloads
 * without a nested object come back as a shallow copy.
 */
export function unwrapResponse(
  payload: Record<string, unknown>,
): Record<string, unknown> {
  const { response, ...rest } = payload;
  if (!isRecord(response)) {
    return { ...payload };
  }
  return { ...rest, ...response };
}

/**
 * Rewrites one upstream SSE line. Anything that is not a `data:` line carrying
 * a JSON object is returned untouched.
 */
export function transformSSELine(line: string, debug = false): string {
  if (!line.startsWith(DATA_PREFIX)) {
    return line;
  }

  const data = line.slice(DATA_PREFIX.length);
  let payload: unknown;
  try {
    payload = JSON.parse(data);
  } catch (error) {
    if (debug) {
      logger.debug(
        `Passing through unparsable SSE payload: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
    return line;
  }

  if (!isRecord(payload)) {
    return line;
  }

  return `${DATA_PREFIX}${JSON.stringify(unwrapResponse(payload))}`;
}

/**
 * Returns the JSON payload of a `data:` line, or `null` for other lines,
 * `[DONE]` markers and unparsable payloads.
 */
export function parseSSEData(line: string): Record<string, unknown> | null {
  if (!line.startsWith(DATA_PREFIX)) return null;

  const data = line.slice(DATA_PREFIX.length).trim();
  if (!data || data === '[DONE]') return null;

  try {
    const parsed: unknown = JSON.parse(data);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

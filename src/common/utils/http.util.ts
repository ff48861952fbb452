import { Logger } from '@nestjs/common';
import type { Response } from 'express';
import { resolveError } from '../filters/api-exception.filter';

export function setSSEHeaders(res: Response): void {
  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.setHeader('X-Accel-Buffering', 'no');
}

/**
 * A signal that aborts when the client disconnects before the response
 * has been fully written.
 */
export function abortOnClose(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}

function isWritable(res: Response): boolean {
  return !res.writableEnded && !res.destroyed;
}

/**
 * Writes every event to an SSE response and ends it. A failure after the
 * headers have gone out is written as a final error event.
 */
export async function writeEventStream(
  res: Response,
  events: AsyncIterable<string>,
  logger: Logger,
): Promise<void> {
  setSSEHeaders(res);
  res.status(200);
  res.flushHeaders();

  try {
    for await (const event of events) {
      if (!isWritable(res)) break;
      res.write(event);
    }
  } catch (error) {
    const { status, body } = resolveError(error);
    logger.error(`Streaming error (${status}): ${body.error.message}`);
    if (isWritable(res)) {
      res.write(`data: ${JSON.stringify(body)}\n\n`);
    }
  } finally {
    if (isWritable(res)) {
      res.end();
    }
  }
}

import { isRecord } from '../utils/object.util';

const ERROR_PREVIEW_LIMIT = 1024;

export function previewBody(body: string, limit = ERROR_PREVIEW_LIMIT): string {
  return body.length > limit ? `${body.slice(0, limit)}...` : body;
}

/**
 * A tool result whose function name can be recovered neither from the message
 * nor from an earlier tool call.
 */
export class MissingFunctionNameError extends Error {
  constructor(readonly toolCallId?: string) {
    super(
      toolCallId
        ? `tool response for tool_call_id "${toolCallId}" is missing a function name and the id does not match any tool call`
        : 'tool response is missing a function name and has no tool_call_id',
    );
    this.name = 'MissingFunctionNameError';
  }
}

export class EmptyTokenError extends Error {
  constructor() {
    super('access token is empty');
    this.name = 'EmptyTokenError';
  }
}

export interface UpstreamErrorDetails {
  statusCode: number;
  body: string;
  contentType: string;
  endpoint: string;
}

export class UpstreamError extends Error {
  readonly statusCode: number;
  readonly body: string;
  readonly contentType: string;
  readonly endpoint: string;

  constructor(details: UpstreamErrorDetails) {
    const preview = previewBody(details.body);
    super(
      details.endpoint
        ? `upstream ${details.endpoint} returned status ${details.statusCode}: ${preview}`
        : `upstream returned status ${details.statusCode}: ${preview}`,
    );
    this.name = 'UpstreamError';
    this.statusCode = details.statusCode;
    this.body = details.body;
    this.contentType = details.contentType;
    this.endpoint = details.endpoint;
  }

  /**
   * The upstream's own `error.message`, when the body is a Google API error.
   */
  get upstreamMessage(): string | undefined {
    try {
      const parsed: unknown = JSON.parse(this.body);
      if (!isRecord(parsed) || !isRecord(parsed.error)) return undefined;
      const { message } = parsed.error;
      return typeof message === 'string' ? message : undefined;
    } catch {
      return undefined;
    }
  }
}

export class TransportError extends Error {
  constructor(
    readonly endpoint: string,
    cause: unknown,
  ) {
    super(
      `request to ${endpoint} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = 'TransportError';
  }
}

export class OnboardingIncompleteError extends Error {
  constructor() {
    super('onboarding completed but no project ID found');
    this.name = 'OnboardingIncompleteError';
  }
}

/**
 * No credential record has been loaded or stored yet.
 */
export class CredentialsUnavailableError extends Error {
  constructor(detail = 'no credentials are configured') {
    super(detail);
    this.name = 'CredentialsUnavailableError';
  }
}

/**
 * The credential provider could not refresh after the upstream rejected the
 * access token.
 */
export class TokenRefreshError extends Error {
  constructor(cause: unknown) {
    super(
      `failed to refresh token: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = 'TokenRefreshError';
  }
}

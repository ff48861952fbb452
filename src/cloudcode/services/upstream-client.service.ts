import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosResponse } from 'axios';
import { Readable } from 'stream';
import {
  API_VERSION,
  CLIENT_METADATA,
  CLIENT_METADATA_HEADER,
  CloudCodeMethod,
  X_GOOG_API_CLIENT,
  platformUserAgent,
} from '../constants';
import {
  FetchAvailableModelsResponse,
  LoadCodeAssistResponse,
  OnboardUserOperation,
  OnboardUserRequest,
} from '../interfaces';
import {
  EmptyTokenError,
  TokenRefreshError,
  TransportError,
  UpstreamError,
} from '../../common/errors';
import { LineSplitter, errorMessage } from '../../common/utils';
import {
  CREDENTIALS_PROVIDER,
  CredentialsProvider,
} from '../../credentials/interfaces';

export interface UpstreamCallOptions {
  signal?: AbortSignal;
}

interface Negotiated {
  response: AxiosResponse<unknown>;
  endpoint: string;
}

export function buildHeaders(
  token: string,
  accept: string,
): Record<string, string> {
  return {
    Authorization: `Bearer ${token}`,
    'Content-Type': 'application/json',
    'User-Agent': platformUserAgent(),
    'X-Goog-Api-Client': X_GOOG_API_CLIENT,
    'Client-Metadata': CLIENT_METADATA_HEADER,
    Accept: accept,
  };
}

async function readBody(data: unknown): Promise<string> {
  if (data instanceof Readable) {
    const chunks: Buffer[] = [];
    for await (const chunk of data) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks).toString('utf-8');
  }
  if (typeof data === 'string') return data;
  return data === undefined ? '' : JSON.stringify(data);
}

function discardBody(data: unknown): void {
  if (data instanceof Readable) {
    data.destroy();
  }
}

/**
 * Authenticated client for the CloudCode API. Endpoints are tried in order;
 * a 401 triggers one token refresh and one retry against the same endpoint.
 */
@Injectable()
export class UpstreamClientService {
  private readonly logger = new Logger(UpstreamClientService.name);
  private readonly endpoints: string[];
  private readonly timeoutMs: number;

  constructor(
    @Inject(CREDENTIALS_PROVIDER)
    private readonly credentials: CredentialsProvider,
    private readonly configService: ConfigService,
  ) {
    this.endpoints =
      this.configService.get<string[]>('cloudcode.endpoints') ?? [];
    this.timeoutMs =
      this.configService.get<number>('cloudcode.timeoutMs') ?? 120000;
  }

  async call<T>(
    method: CloudCodeMethod,
    body: unknown,
    options: UpstreamCallOptions = {},
  ): Promise<T> {
    const startTime = Date.now();
    const { response, endpoint } = await this.negotiate(
      method,
      body,
      false,
      options.signal,
    );
    this.logger.debug(
      `${method} via ${endpoint} took ${Date.now() - startTime}ms`,
    );

    const text = await readBody(response.data);
    try {
      return JSON.parse(text) as T;
    } catch (error) {
      throw new Error(
        `could not parse ${method} response from ${endpoint}: ${errorMessage(error)}`,
      );
    }
  }

  /**
   * Resolves once an endpoint answers 200 with a live body. The returned
   * iterable yields the raw SSE lines; breaking out of it, or aborting the
   * signal, destroys the upstream body.
   */
  async stream(
    method: CloudCodeMethod,
    body: unknown,
    options: UpstreamCallOptions = {},
  ): Promise<AsyncIterable<string>> {
    const { response, endpoint } = await this.negotiate(
      method,
      body,
      true,
      options.signal,
    );

    const data = response.data;
    if (!(data instanceof Readable)) {
      throw new Error(`${method} via ${endpoint} returned no stream body`);
    }

    this.logger.debug(`${method} stream opened via ${endpoint}`);
    return this.readLines(data, endpoint, options.signal);
  }

  loadCodeAssist(
    options: UpstreamCallOptions = {},
  ): Promise<LoadCodeAssistResponse> {
    return this.call<LoadCodeAssistResponse>(
      'loadCodeAssist',
      { metadata: CLIENT_METADATA },
      options,
    );
  }

  onboardUser(
    request: OnboardUserRequest,
    options: UpstreamCallOptions = {},
  ): Promise<OnboardUserOperation> {
    return this.call<OnboardUserOperation>('onboardUser', request, options);
  }

  fetchAvailableModels(
    options: UpstreamCallOptions = {},
  ): Promise<FetchAvailableModelsResponse> {
    return this.call<FetchAvailableModelsResponse>(
      'fetchAvailableModels',
      {},
      options,
    );
  }

  private async negotiate(
    method: CloudCodeMethod,
    body: unknown,
    stream: boolean,
    signal: AbortSignal | undefined,
  ): Promise<Negotiated> {
    let lastError: Error | undefined;

    for (const endpoint of this.endpoints) {
      signal?.throwIfAborted();

      const url = stream
        ? `${endpoint}/${API_VERSION}:${method}?alt=sse`
        : `${endpoint}/${API_VERSION}:${method}`;

      let response: AxiosResponse<unknown>;
      try {
        response = await this.send(url, body, stream, signal);

        if (response.status === 401) {
          discardBody(response.data);
          this.logger.warn(
            `${method} got 401 from ${endpoint}, refreshing token`,
          );
          const refreshError = await this.tryRefresh();
          if (refreshError) {
            lastError = refreshError;
            this.logger.warn(
              `${method} skipping ${endpoint}: ${refreshError.message}`,
            );
            continue;
          }

          // A second 401 falls through and is recorded like any other status.
          response = await this.send(url, body, stream, signal);
        }
      } catch (error) {
        if (axios.isCancel(error) || !axios.isAxiosError(error)) {
          throw error;
        }
        lastError = new TransportError(endpoint, error);
        this.logger.warn(
          `${method} request to ${endpoint} failed: ${errorMessage(error)}`,
        );
        continue;
      }

      if (response.status === 200) {
        return { response, endpoint };
      }

      lastError = new UpstreamError({
        statusCode: response.status,
        body: await readBody(response.data),
        contentType: String(response.headers['content-type'] ?? ''),
        endpoint,
      });
      this.logger.warn(
        `${method} returned status ${response.status} from ${endpoint}`,
      );
    }

    throw (
      lastError ??
      new Error(`${method} failed with no endpoints available`)
    );
  }

  private async tryRefresh(): Promise<TokenRefreshError | null> {
    try {
      await this.credentials.refreshToken();
      return null;
    } catch (error) {
      return new TokenRefreshError(error);
    }
  }

  private async send(
    url: string,
    body: unknown,
    stream: boolean,
    signal: AbortSignal | undefined,
  ): Promise<AxiosResponse<unknown>> {
    const credentials = await this.credentials.getCredentials();
    if (!credentials.accessToken) {
      throw new EmptyTokenError();
    }

    this.logger.verbose(`POST ${url}`);

    return axios.request<unknown>({
      method: 'POST',
      url,
      data: body,
      headers: buildHeaders(
        credentials.accessToken,
        stream ? 'text/event-stream' : 'application/json',
      ),
      responseType: stream ? 'stream' : 'text',
      timeout: this.timeoutMs,
      validateStatus: () => true,
      signal,
    });
  }

  private async *readLines(
    body: Readable,
    endpoint: string,
    signal: AbortSignal | undefined,
  ): AsyncGenerator<string> {
    const onAbort = () => body.destroy();
    signal?.addEventListener('abort', onAbort, { once: true });

    const splitter = new LineSplitter();
    try {
      for await (const chunk of body) {
        yield* splitter.push(
          Buffer.isBuffer(chunk) ? chunk : String(chunk),
        );
      }
      yield* splitter.flush();
    } catch (error) {
      if (signal?.aborted) {
        this.logger.debug(`Stream from ${endpoint} closed after client abort`);
      } else {
        this.logger.warn(
          `Upstream stream read error from ${endpoint}: ${errorMessage(error)}`,
        );
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
      body.destroy();
    }
  }
}

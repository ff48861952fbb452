import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChatCompletionRequestDto, ChatCompletionResponse } from '../dto';
import { GenerateContentRequest } from '../interfaces';
import { parseSSEData, transformSSELine } from '../../common/utils';
import { RequestTransformerService } from './request-transformer.service';
import { ResponseTransformerService } from './response-transformer.service';
import { StreamTransformerService } from './stream-transformer.service';

/**
 * Converts between the OpenAI chat completion API and CloudCode payloads.
 *
 * Requests go through {@link RequestTransformerService}. Unary responses are
 * mapped by {@link ResponseTransformerService}. Streamed responses arrive as
 * raw upstream SSE lines and leave as OpenAI `data:` events: one
 * `chat.completion.chunk` per forwarded upstream event, a closing chunk when
 * upstream never reported a finish reason, then `[DONE]`.
 */
@Injectable()
export class TransformerService {
  private readonly logger = new Logger(TransformerService.name);
  private readonly debugSse: boolean;

  constructor(
    private readonly requestTransformer: RequestTransformerService,
    private readonly responseTransformer: ResponseTransformerService,
    private readonly streamTransformer: StreamTransformerService,
    private readonly configService: ConfigService,
  ) {
    this.debugSse =
      this.configService.get<boolean>('cloudcode.debugSse') ?? false;
  }

  /**
   * Builds the CloudCode request envelope for an OpenAI chat completion.
   */
  transformRequest(
    dto: ChatCompletionRequestDto,
    projectId: string,
  ): GenerateContentRequest {
    return this.requestTransformer.transformRequest(dto, projectId);
  }

  /**
   * Maps an unwrapped `generateContent` payload to a `chat.completion`.
   */
  transformResponse(
    payload: Record<string, unknown>,
    model: string,
    requestId: string,
  ): ChatCompletionResponse {
    return this.responseTransformer.transformResponse(
      payload,
      model,
      requestId,
    );
  }

  /**
   * Turns upstream SSE lines into OpenAI stream events. Lines without a
   * JSON payload are skipped, and so are events with nothing to forward.
   * Stops pulling from `lines` as soon as the consumer stops reading.
   */
  async *transformStream(
    lines: AsyncIterable<string>,
    model: string,
    requestId: string,
  ): AsyncGenerator<string> {
    const accumulator = this.streamTransformer.createStreamAccumulator();
    let forwarded = 0;

    for await (const line of lines) {
      const payload = parseSSEData(transformSSELine(line, this.debugSse));
      if (!payload) continue;

      const chunk = this.streamTransformer.transformStreamChunk(
        payload,
        model,
        requestId,
        accumulator,
      );
      if (chunk) {
        forwarded++;
        yield `data: ${JSON.stringify(chunk)}\n\n`;
      }
    }

    if (!accumulator.isComplete) {
      const finalChunk = this.streamTransformer.createFinalChunk(
        requestId,
        model,
        accumulator,
      );
      yield `data: ${JSON.stringify(finalChunk)}\n\n`;
    }
    yield 'data: [DONE]\n\n';

    this.logger.debug(`Stream ${requestId} finished: chunks=${forwarded}`);
  }
}

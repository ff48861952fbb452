import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import {
  ChatCompletionRequestDto,
  ChatCompletionResponse,
  ModelInfo,
  ModelsResponse,
} from './dto';
import { GenerateContentRequest } from './interfaces';
import { MODEL_OWNERS, isSupportedModel, modelFamily } from './constants';
import { GeminiNormalizerService } from './services/gemini-normalizer.service';
import { RequestPreparerService } from './services/request-preparer.service';
import { TransformerService } from './services/transformer.service';
import {
  UpstreamCallOptions,
  UpstreamClientService,
} from './services/upstream-client.service';
import { ProjectService } from '../project/project.service';
import { isRecord, transformSSELine, unwrapResponse } from '../common/utils';

@Injectable()
export class CloudCodeService {
  private readonly logger = new Logger(CloudCodeService.name);
  private readonly debugSse: boolean;

  constructor(
    private readonly upstream: UpstreamClientService,
    private readonly projectService: ProjectService,
    private readonly preparer: RequestPreparerService,
    private readonly normalizer: GeminiNormalizerService,
    private readonly transformerService: TransformerService,
    private readonly configService: ConfigService,
  ) {
    this.debugSse =
      this.configService.get<boolean>('cloudcode.debugSse') ?? false;
  }

  async chatCompletion(
    dto: ChatCompletionRequestDto,
    options: UpstreamCallOptions = {},
  ): Promise<ChatCompletionResponse> {
    const requestId = `chatcmpl-${uuidv4()}`;
    const request = await this.buildChatRequest(dto, options);

    this.logger.debug(
      `Chat completion: model=${dto.model}, messages=${dto.messages.length}`,
    );

    const payload = await this.callGenerateContent(request, options);
    return this.transformerService.transformResponse(
      payload,
      dto.model,
      requestId,
    );
  }

  /**
   * Opens the upstream stream and resolves with the OpenAI SSE events to
   * write. Errors before the upstream answers reject the promise.
   */
  async chatCompletionStream(
    dto: ChatCompletionRequestDto,
    options: UpstreamCallOptions = {},
  ): Promise<AsyncIterable<string>> {
    const requestId = `chatcmpl-${uuidv4()}`;
    const request = await this.buildChatRequest(dto, options);

    this.logger.debug(`Streaming chat completion: model=${dto.model}`);

    const lines = await this.upstream.stream(
      'streamGenerateContent',
      this.preparer.prepare(request),
      options,
    );
    return this.transformerService.transformStream(lines, dto.model, requestId);
  }

  async generateContent(
    model: string,
    body: unknown,
    options: UpstreamCallOptions = {},
  ): Promise<Record<string, unknown>> {
    const request = await this.buildGeminiRequest(model, body, options);
    this.logger.debug(`generateContent: model=${model}`);
    return this.callGenerateContent(request, options);
  }

  /**
   * Resolves with the upstream SSE lines, each rewritten into the flat
   * Gemini shape and terminated with a newline.
   */
  async streamGenerateContent(
    model: string,
    body: unknown,
    options: UpstreamCallOptions = {},
  ): Promise<AsyncIterable<string>> {
    const request = await this.buildGeminiRequest(model, body, options);
    this.logger.debug(`streamGenerateContent: model=${model}`);

    const lines = await this.upstream.stream(
      'streamGenerateContent',
      this.preparer.prepare(request),
      options,
    );
    return this.toGeminiEvents(lines);
  }

  async listModels(options: UpstreamCallOptions = {}): Promise<ModelsResponse> {
    const available = await this.upstream.fetchAvailableModels(options);
    const created = Math.floor(Date.now() / 1000);

    const data = Object.entries(available.models ?? {})
      .filter(([id]) => isSupportedModel(id))
      .map(([id, info]): ModelInfo => {
        const family = modelFamily(id);
        return {
          id,
          object: 'model',
          created,
          owned_by: family ? MODEL_OWNERS[family] : 'unknown',
          display_name: info.displayName || id,
        };
      })
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

    return { object: 'list', data };
  }

  async getModel(
    id: string,
    options: UpstreamCallOptions = {},
  ): Promise<ModelInfo> {
    const { data } = await this.listModels(options);
    const model = data.find((entry) => entry.id === id);
    if (!model) {
      throw new NotFoundException(`The model '${id}' does not exist`);
    }
    return model;
  }

  private async buildChatRequest(
    dto: ChatCompletionRequestDto,
    options: UpstreamCallOptions,
  ): Promise<GenerateContentRequest> {
    const projectId = await this.projectService.resolveProjectId(options);
    return this.transformerService.transformRequest(dto, projectId);
  }

  private async buildGeminiRequest(
    model: string,
    body: unknown,
    options: UpstreamCallOptions,
  ): Promise<GenerateContentRequest> {
    const inner = this.normalizer.normalizeRequest(body);
    const project = await this.projectService.resolveProjectId(options);
    return { model, project, request: inner };
  }

  private async callGenerateContent(
    request: GenerateContentRequest,
    options: UpstreamCallOptions,
  ): Promise<Record<string, unknown>> {
    const response = await this.upstream.call<unknown>(
      'generateContent',
      this.preparer.prepare(request),
      options,
    );
    if (!isRecord(response)) {
      throw new Error('generateContent returned a non-object response');
    }
    return unwrapResponse(response);
  }

  private async *toGeminiEvents(
    lines: AsyncIterable<string>,
  ): AsyncGenerator<string> {
    for await (const line of lines) {
      yield `${transformSSELine(line, this.debugSse)}\n`;
    }
  }
}

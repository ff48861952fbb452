import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  ChatCompletionRequestDto,
  MessageDto,
  ToolChoice,
  ToolDto,
} from '../dto';
import {
  Content,
  ContentPart,
  FunctionDeclaration,
  FunctionResponsePart,
  GenerateContentRequest,
  GenerationConfig,
  SystemInstruction,
  TextPart,
  Tool,
  ToolConfig,
} from '../interfaces';
import { MissingFunctionNameError } from '../../common/errors';
import { convertSchema, isRecord } from '../../common/utils';

const TOOL_RESPONSE_PREVIEW = 300;

export interface TranslatedMessages {
  contents: Content[];
  systemInstruction?: SystemInstruction;
}

/**
 * Call ids seen so far, indexed both ways so that tool results can recover a
 * missing name or id.
 */
class ToolCallRegistry {
  private readonly nameById = new Map<string, string>();
  private readonly idsByName = new Map<string, string[]>();

  record(id: string, name: string): void {
    this.nameById.set(id, name);
    const ids = this.idsByName.get(name) ?? [];
    ids.push(id);
    this.idsByName.set(name, ids);
  }

  rememberName(id: string, name: string): void {
    this.nameById.set(id, name);
  }

  nameFor(id: string): string | undefined {
    return this.nameById.get(id);
  }

  consume(name: string, id: string): void {
    const ids = this.idsByName.get(name);
    const index = ids?.lastIndexOf(id) ?? -1;
    if (ids && index !== -1) {
      ids.splice(index, 1);
    }
  }

  takeLatest(name: string): string | undefined {
    return this.idsByName.get(name)?.pop();
  }
}

/**
 * Turns OpenAI-compatible chat completion requests into CloudCode requests.
 */
@Injectable()
export class RequestTransformerService {
  private readonly logger = new Logger(RequestTransformerService.name);

  transformRequest(
    dto: ChatCompletionRequestDto,
    projectId: string,
  ): GenerateContentRequest {
    const { contents, systemInstruction } = this.transformMessages(
      dto.messages,
    );

    const request: GenerateContentRequest = {
      model: dto.model,
      project: projectId,
      request: { contents },
    };

    if (systemInstruction) {
      request.request.systemInstruction = systemInstruction;
    }

    const generationConfig = this.buildGenerationConfig(dto);
    if (generationConfig) {
      request.request.generationConfig = generationConfig;
    }

    const tools = this.transformTools(dto.tools);
    if (tools) {
      request.request.tools = tools;
      if (dto.tool_choice !== undefined) {
        request.request.toolConfig = this.transformToolChoice(dto.tool_choice);
      }
    }

    return request;
  }

  /**
   * Converts the message list into contents plus a system instruction.
   *
   * Tool results never stay where they appear: they are collected and
   * appended as a single `user` turn after everything else, since the
   * upstream expects them to trail the model turn that asked for them.
   */
  transformMessages(messages: MessageDto[]): TranslatedMessages {
    const registry = new ToolCallRegistry();
    for (const msg of messages) {
      if (msg.role !== 'assistant') continue;
      for (const call of msg.tool_calls ?? []) {
        if (call.id && call.function.name) {
          registry.rememberName(call.id, call.function.name);
        }
      }
    }

    const contents: Content[] = [];
    const toolParts: FunctionResponsePart[] = [];
    let system: TextPart[] | undefined;

    for (const msg of messages) {
      if (msg.role === 'system') {
        system = system ?? [];
        for (const text of this.textEntries(msg.content)) {
          if (text) system.push({ text });
        }
        continue;
      }

      if (msg.role === 'tool') {
        toolParts.push(this.transformToolResponse(msg, registry));
        continue;
      }

      const parts: ContentPart[] = this.textEntries(msg.content).map(
        (text) => ({ text }),
      );

      if (msg.role === 'assistant') {
        parts.push(...this.transformToolCalls(msg, registry));
      }

      if (parts.length > 0) {
        contents.push({
          role: msg.role === 'assistant' ? 'model' : 'user',
          parts,
        });
      }
    }

    if (toolParts.length > 0) {
      contents.push({ role: 'user', parts: toolParts });
    }

    return {
      contents,
      systemInstruction: system && { role: 'system', parts: system },
    };
  }

  private textEntries(content: MessageDto['content']): string[] {
    if (typeof content === 'string') return [content];
    if (!Array.isArray(content)) return [];

    return content
      .filter((part) => part.type === 'text' && typeof part.text === 'string')
      .map((part) => part.text ?? '');
  }

  private transformToolCalls(
    msg: MessageDto,
    registry: ToolCallRegistry,
  ): ContentPart[] {
    return (msg.tool_calls ?? []).map((call) => {
      const name = call.function.name;
      const id = call.id?.trim() ? call.id : `toolu_${uuidv4()}`;
      if (name) {
        registry.record(id, name);
      }

      return {
        functionCall: {
          id,
          name,
          args: this.parseArguments(call.function.arguments),
        },
      };
    });
  }

  private parseArguments(raw: string | undefined): Record<string, unknown> {
    if (!raw) return {};
    try {
      const parsed: unknown = JSON.parse(raw);
      return isRecord(parsed) ? parsed : {};
    } catch {
      this.logger.debug(`Tool call arguments are not valid JSON: ${raw}`);
      return {};
    }
  }

  private transformToolResponse(
    msg: MessageDto,
    registry: ToolCallRegistry,
  ): FunctionResponsePart {
    const callId = msg.tool_call_id?.trim() ?? '';
    const name = msg.name || (callId ? registry.nameFor(callId) : undefined);
    if (!name) {
      throw new MissingFunctionNameError(callId || undefined);
    }

    let id: string | undefined = callId;
    if (id) {
      registry.consume(name, id);
    } else {
      id = registry.takeLatest(name);
    }

    const output =
      typeof msg.content === 'string'
        ? msg.content
        : this.textEntries(msg.content)
            .filter((text) => text !== '')
            .join('\n');

    this.logger.debug(
      `Forwarding tool response: function=${name}, id=${id ?? '-'}, length=${output.length}, preview=${output.slice(0, TOOL_RESPONSE_PREVIEW)}`,
    );

    return {
      functionResponse: {
        ...(id ? { id } : {}),
        name,
        response: { output },
      },
    };
  }

  buildGenerationConfig(
    dto: ChatCompletionRequestDto,
  ): GenerationConfig | undefined {
    const config: GenerationConfig = {};

    if (dto.temperature !== undefined) config.temperature = dto.temperature;
    if (dto.top_p !== undefined) config.topP = dto.top_p;
    if (dto.max_tokens) config.maxOutputTokens = dto.max_tokens;
    if (dto.stop && dto.stop.length > 0) config.stopSequences = dto.stop;

    return Object.keys(config).length > 0 ? config : undefined;
  }

  transformTools(tools: ToolDto[] | undefined): Tool[] | undefined {
    const functionDeclarations: FunctionDeclaration[] = [];

    for (const tool of tools ?? []) {
      if (tool.type.toLowerCase() !== 'function' || !tool.function) continue;

      const declaration: FunctionDeclaration = { name: tool.function.name };
      if (tool.function.description) {
        declaration.description = tool.function.description;
      }
      const parameters = convertSchema(tool.function.parameters);
      if (parameters) {
        declaration.parameters = parameters;
      }
      functionDeclarations.push(declaration);
    }

    return functionDeclarations.length > 0
      ? [{ functionDeclarations }]
      : undefined;
  }

  transformToolChoice(toolChoice: ToolChoice): ToolConfig {
    if (toolChoice === 'none') {
      return { functionCallingConfig: { mode: 'NONE' } };
    }
    if (toolChoice === 'required') {
      return { functionCallingConfig: { mode: 'ANY' } };
    }
    if (typeof toolChoice === 'object' && toolChoice.function?.name) {
      return {
        functionCallingConfig: {
          mode: 'ANY',
          allowedFunctionNames: [toolChoice.function.name],
        },
      };
    }
    return { functionCallingConfig: { mode: 'AUTO' } };
  }
}

import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import {
  Content,
  ContentPart,
  FunctionDeclaration,
  GenerationConfig,
  InternalRequest,
  SystemInstruction,
  TextPart,
  ThinkingConfig,
  Tool,
} from '../interfaces';
import { convertSchema, isRecord } from '../../common/utils';

/**
 * Accepted spellings per logical field, tried in order.
 */
export const FIELD_ALIASES = {
  systemInstruction: ['systemInstruction', 'system_instruction'],
  generationConfig: ['generationConfig', 'generation_config'],
  sessionId: ['sessionId', 'session_id'],
  functionDeclarations: ['functionDeclarations', 'function_declarations'],
  parameters: [
    'parameters',
    'parametersJsonSchema',
    'parameters_json_schema',
    'input_schema',
    'inputSchema',
  ],
  rawToolSchema: ['input_schema', 'inputSchema', 'parameters'],
  thinkingConfig: ['thinkingConfig', 'thinking_config'],
  maxOutputTokens: ['maxOutputTokens', 'max_output_tokens'],
  topP: ['topP', 'top_p'],
  topK: ['topK', 'top_k'],
  stopSequences: ['stopSequences', 'stop_sequences'],
  thinkingBudget: ['thinkingBudget', 'thinking_budget'],
  thinkingLevel: ['thinkingLevel', 'thinking_level'],
  includeThoughts: ['includeThoughts', 'include_thoughts'],
  toolConfig: ['toolConfig', 'tool_config'],
  functionCallingConfig: ['functionCallingConfig', 'function_calling_config'],
  allowedFunctionNames: ['allowedFunctionNames', 'allowed_function_names'],
  functionCall: ['functionCall', 'function_call'],
  functionResponse: ['functionResponse', 'function_response'],
  thoughtSignature: ['thoughtSignature', 'thought_signature'],
} as const;

type AliasedField = keyof typeof FIELD_ALIASES;

const TOOL_NAME_MAX_LENGTH = 64;

export function pickField(
  source: Record<string, unknown>,
  field: AliasedField,
): unknown {
  for (const key of FIELD_ALIASES[field]) {
    const value = source[key];
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
}

function pickString(
  source: Record<string, unknown>,
  key: string,
): string | undefined {
  const value = source[key];
  return typeof value === 'string' ? value : undefined;
}

function pickNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value)
    ? value
    : undefined;
}

/**
 * Restricts a tool name to `[A-Za-z0-9_-]`, at most 64 characters.
 */
export function sanitizeToolName(name: string): string {
  return name
    .trim()
    .replace(/[^A-Za-z0-9_-]/g, '_')
    .slice(0, TOOL_NAME_MAX_LENGTH);
}

/**
 * Reads Gemini-style request bodies, tolerating the snake_case spellings and
 * the raw tool shapes that clients send.
 */
@Injectable()
export class GeminiNormalizerService {
  private readonly logger = new Logger(GeminiNormalizerService.name);

  normalizeRequest(body: unknown): InternalRequest {
    if (!isRecord(body)) {
      throw new BadRequestException('request body must be a JSON object');
    }
    const contents = body.contents ?? [];
    if (!Array.isArray(contents)) {
      throw new BadRequestException('contents must be an array');
    }

    const request: InternalRequest = {
      contents: contents
        .filter(isRecord)
        .map((content) => this.normalizeContent(content)),
    };

    const systemInstruction = this.normalizeSystemInstruction(
      pickField(body, 'systemInstruction'),
    );
    if (systemInstruction) request.systemInstruction = systemInstruction;

    const tools = this.normalizeTools(body.tools);
    if (tools) request.tools = tools;

    const toolConfig = pickField(body, 'toolConfig');
    if (isRecord(toolConfig)) {
      const config = pickField(toolConfig, 'functionCallingConfig');
      if (isRecord(config) && typeof config.mode === 'string') {
        const mode = config.mode.toUpperCase();
        if (mode === 'AUTO' || mode === 'NONE' || mode === 'ANY') {
          const names = pickField(config, 'allowedFunctionNames');
          const allowed = Array.isArray(names)
            ? names.filter(
                (name): name is string => typeof name === 'string',
              )
            : undefined;
          request.toolConfig = {
            functionCallingConfig: {
              mode,
              ...(allowed ? { allowedFunctionNames: allowed } : {}),
            },
          };
        }
      }
    }

    const generationConfig = this.normalizeGenerationConfig(
      pickField(body, 'generationConfig'),
    );
    if (generationConfig) request.generationConfig = generationConfig;

    const sessionId = pickField(body, 'sessionId');
    if (typeof sessionId === 'string' && sessionId) {
      request.sessionId = sessionId;
    }

    return request;
  }

  private normalizeContent(content: Record<string, unknown>): Content {
    const role =
      typeof content.role === 'string' && content.role.toLowerCase() === 'model'
        ? 'model'
        : 'user';
    const parts = Array.isArray(content.parts)
      ? content.parts.filter(isRecord).map((part) => this.normalizePart(part))
      : [];
    return { role, parts };
  }

  private normalizePart(part: Record<string, unknown>): ContentPart {
    const signature = pickField(part, 'thoughtSignature');
    const extra = typeof signature === 'string' ? { thoughtSignature: signature } : {};

    const call = pickField(part, 'functionCall');
    if (isRecord(call)) {
      const id = pickString(call, 'id');
      return {
        ...extra,
        functionCall: {
          ...(id ? { id } : {}),
          name: pickString(call, 'name') ?? '',
          args: isRecord(call.args) ? call.args : {},
        },
      };
    }

    const response = pickField(part, 'functionResponse');
    if (isRecord(response)) {
      const id = pickString(response, 'id');
      return {
        ...extra,
        functionResponse: {
          ...(id ? { id } : {}),
          name: pickString(response, 'name') ?? '',
          response: isRecord(response.response) ? response.response : {},
        },
      };
    }

    const text: TextPart = { ...extra, text: pickString(part, 'text') ?? '' };
    if (part.thought === true) text.thought = true;
    return text;
  }

  private normalizeSystemInstruction(
    value: unknown,
  ): SystemInstruction | undefined {
    if (typeof value === 'string') {
      return { role: 'user', parts: [{ text: value }] };
    }
    if (!isRecord(value)) return undefined;

    const parts = Array.isArray(value.parts)
      ? value.parts
          .filter(isRecord)
          .map((part) => pickString(part, 'text'))
          .filter((text): text is string => text !== undefined)
          .map((text) => ({ text }))
      : [];

    return {
      role: typeof value.role === 'string' ? value.role : 'user',
      parts,
    };
  }

  /**
   * `tools` may be a single object or an array. Entries carrying function
   * declarations are read as such; when none do, every entry is treated as a
   * raw tool definition.
   */
  normalizeTools(value: unknown): Tool[] | undefined {
    if (value === undefined || value === null) return undefined;

    const entries = (Array.isArray(value) ? value : [value]).filter(isRecord);

    const declared = entries
      .map((entry) => this.declarationsOf(entry))
      .filter((declarations) => declarations.length > 0);
    if (declared.length > 0) {
      return declared.map((functionDeclarations) => ({ functionDeclarations }));
    }

    return this.convertRawTools(entries);
  }

  private declarationsOf(entry: Record<string, unknown>): FunctionDeclaration[] {
    const raw = pickField(entry, 'functionDeclarations');
    if (!Array.isArray(raw)) return [];

    return raw.filter(isRecord).map((item) => {
      const declaration: FunctionDeclaration = {
        name: pickString(item, 'name') ?? '',
      };
      const description = pickString(item, 'description');
      if (description) declaration.description = description;

      const parameters = convertSchema(pickField(item, 'parameters'));
      if (parameters) declaration.parameters = parameters;
      return declaration;
    });
  }

  private convertRawTools(entries: Record<string, unknown>[]): Tool[] | undefined {
    const functionDeclarations: FunctionDeclaration[] = [];
    let missingName = 0;
    let missingSchema = 0;

    for (const entry of entries) {
      const { name, description, schema } = this.rawToolFields(entry);
      if (!schema) missingSchema++;
      if (!name) {
        missingName++;
        continue;
      }

      functionDeclarations.push({
        name,
        ...(description ? { description } : {}),
        parameters: convertSchema(schema) ?? { type: 'OBJECT' },
      });
    }

    if (missingName > 0 || missingSchema > 0) {
      this.logger.warn(
        `Raw tools with missing fields: total=${entries.length}, converted=${functionDeclarations.length}, missing_name=${missingName}, missing_schema=${missingSchema}`,
      );
    } else if (functionDeclarations.length > 0) {
      this.logger.debug(
        `Converted ${functionDeclarations.length} raw tool(s): ${functionDeclarations
          .slice(0, 6)
          .map((fn) => fn.name)
          .join(',')}`,
      );
    }

    return functionDeclarations.length > 0
      ? [{ functionDeclarations }]
      : undefined;
  }

  private rawToolFields(entry: Record<string, unknown>): {
    name: string;
    description?: string;
    schema?: Record<string, unknown>;
  } {
    const sources = [entry, entry.custom, entry.function].filter(isRecord);

    let name: string | undefined;
    let description: string | undefined;
    let schema: Record<string, unknown> | undefined;
    for (const source of sources) {
      name = name || pickString(source, 'name');
      description = description || pickString(source, 'description');
      if (!schema) {
        const candidate = pickField(source, 'rawToolSchema');
        if (isRecord(candidate)) schema = candidate;
      }
    }

    return { name: sanitizeToolName(name ?? ''), description, schema };
  }

  private normalizeGenerationConfig(
    value: unknown,
  ): GenerationConfig | undefined {
    if (!isRecord(value)) return undefined;

    const config: GenerationConfig = {};
    const temperature = pickNumber(value.temperature);
    if (temperature !== undefined) config.temperature = temperature;
    const topP = pickNumber(pickField(value, 'topP'));
    if (topP !== undefined) config.topP = topP;
    const topK = pickNumber(pickField(value, 'topK'));
    if (topK !== undefined) config.topK = topK;
    const maxOutputTokens = pickNumber(pickField(value, 'maxOutputTokens'));
    if (maxOutputTokens !== undefined) config.maxOutputTokens = maxOutputTokens;

    const stop = pickField(value, 'stopSequences');
    if (Array.isArray(stop)) {
      config.stopSequences = stop.filter(
        (entry): entry is string => typeof entry === 'string',
      );
    }

    const thinking = pickField(value, 'thinkingConfig');
    if (isRecord(thinking)) {
      const thinkingConfig: ThinkingConfig = {};
      const include = pickField(thinking, 'includeThoughts');
      if (typeof include === 'boolean') thinkingConfig.includeThoughts = include;
      const level = pickField(thinking, 'thinkingLevel');
      if (typeof level === 'string') thinkingConfig.thinkingLevel = level;
      const budget = pickNumber(pickField(thinking, 'thinkingBudget'));
      if (budget !== undefined) thinkingConfig.thinkingBudget = budget;
      config.thinkingConfig = thinkingConfig;
    }

    return config;
  }
}

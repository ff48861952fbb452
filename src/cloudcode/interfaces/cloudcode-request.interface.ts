export type ContentRole = 'user' | 'model';

export interface FunctionCall {
  id?: string;
  name: string;
  args: Record<string, unknown>;
}

export interface FunctionResponse {
  id?: string;
  name: string;
  response: Record<string, unknown>;
}

interface PartBase {
  /** Opaque token the upstream uses to validate thought continuity. */
  thoughtSignature?: string;
}

export interface TextPart extends PartBase {
  text: string;
  thought?: boolean;
  functionCall?: never;
  functionResponse?: never;
}

export interface FunctionCallPart extends PartBase {
  functionCall: FunctionCall;
  text?: never;
  functionResponse?: never;
}

export interface FunctionResponsePart extends PartBase {
  functionResponse: FunctionResponse;
  text?: never;
  functionCall?: never;
}

export type ContentPart = TextPart | FunctionCallPart | FunctionResponsePart;

export interface Content {
  role: ContentRole;
  parts: ContentPart[];
}

export interface SystemInstruction {
  role: string;
  parts: TextPart[];
}

export interface ParameterSchema {
  type?: string;
  description?: string;
  properties?: Record<string, ParameterSchema>;
  items?: ParameterSchema;
  required?: string[];
  enum?: string[];
}

export interface FunctionDeclaration {
  name: string;
  description?: string;
  parameters?: ParameterSchema;
}

export interface Tool {
  functionDeclarations: FunctionDeclaration[];
}

export interface ToolConfig {
  functionCallingConfig: {
    mode: 'AUTO' | 'NONE' | 'ANY';
    allowedFunctionNames?: string[];
  };
}

export interface ThinkingConfig {
  includeThoughts?: boolean;
  thinkingLevel?: string;
  thinkingBudget?: number;
}

export interface GenerationConfig {
  temperature?: number;
  topP?: number;
  topK?: number;
  maxOutputTokens?: number;
  stopSequences?: string[];
  thinkingConfig?: ThinkingConfig;
}

export interface InternalRequest {
  contents: Content[];
  systemInstruction?: SystemInstruction;
  tools?: Tool[];
  toolConfig?: ToolConfig;
  generationConfig?: GenerationConfig;
  sessionId?: string;
}

export interface GenerateContentRequest {
  model: string;
  project: string;
  requestId?: string;
  userAgent?: string;
  requestType?: string;
  user_prompt_id?: string;
  session_id?: string;
  request: InternalRequest;
}

export function isFunctionCallPart(part: ContentPart): part is FunctionCallPart {
  return part.functionCall !== undefined;
}

export function isFunctionResponsePart(
  part: ContentPart,
): part is FunctionResponsePart {
  return part.functionResponse !== undefined;
}

export function isTextPart(part: ContentPart): part is TextPart {
  return !isFunctionCallPart(part) && !isFunctionResponsePart(part);
}

import { Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  ChatCompletionResponse,
  ChatCompletionChoice,
  FinishReason,
  ToolCallResponse,
  UsageInfo,
} from '../dto';
import { ResponsePart, UsageMetadata } from '../interfaces';
import { isRecord } from '../../common/utils';

export interface CandidateView {
  parts: ResponsePart[];
  finishReason?: string;
}

function readPart(raw: Record<string, unknown>): ResponsePart {
  const part: ResponsePart = {};
  if (typeof raw.text === 'string') part.text = raw.text;
  if (raw.thought === true) part.thought = true;
  if (typeof raw.thoughtSignature === 'string') {
    part.thoughtSignature = raw.thoughtSignature;
  }

  const call = raw.functionCall;
  if (isRecord(call) && typeof call.name === 'string') {
    part.functionCall = {
      name: call.name,
      args: isRecord(call.args) ? call.args : {},
      ...(typeof call.id === 'string' && call.id ? { id: call.id } : {}),
    };
  }
  return part;
}

/**
 * First candidate of a flat Gemini payload, or `null` when there is none.
 */
export function readCandidate(
  payload: Record<string, unknown>,
): CandidateView | null {
  const candidates = payload.candidates;
  if (!Array.isArray(candidates)) return null;

  const candidate: unknown = candidates[0];
  if (!isRecord(candidate)) return null;

  const content = candidate.content;
  const parts =
    isRecord(content) && Array.isArray(content.parts)
      ? content.parts.filter(isRecord).map(readPart)
      : [];

  return {
    parts,
    ...(typeof candidate.finishReason === 'string'
      ? { finishReason: candidate.finishReason }
      : {}),
  };
}

export function readUsage(
  payload: Record<string, unknown>,
): UsageMetadata | null {
  const usage = payload.usageMetadata;
  if (!isRecord(usage)) return null;

  const count = (value: unknown) =>
    typeof value === 'number' ? value : undefined;
  return {
    promptTokenCount: count(usage.promptTokenCount),
    candidatesTokenCount: count(usage.candidatesTokenCount),
    thoughtsTokenCount: count(usage.thoughtsTokenCount),
    totalTokenCount: count(usage.totalTokenCount),
  };
}

export function toUsageInfo(usage: UsageMetadata): UsageInfo {
  const prompt = usage.promptTokenCount ?? 0;
  const completion = usage.candidatesTokenCount ?? 0;
  const info: UsageInfo = {
    prompt_tokens: prompt,
    completion_tokens: completion,
    total_tokens: usage.totalTokenCount ?? prompt + completion,
  };
  if (usage.thoughtsTokenCount) {
    info.completion_tokens_details = {
      reasoning_tokens: usage.thoughtsTokenCount,
    };
  }
  return info;
}

export function mapFinishReason(reason?: string): FinishReason {
  switch (reason) {
    case 'MAX_TOKENS':
      return 'length';
    case 'SAFETY':
    case 'RECITATION':
      return 'content_filter';
    default:
      return 'stop';
  }
}

export function toToolCall(part: ResponsePart): ToolCallResponse | null {
  if (!part.functionCall) return null;
  return {
    id:
      part.functionCall.id ||
      `call_${uuidv4().replace(/-/g, '').slice(0, 24)}`,
    type: 'function',
    function: {
      name: part.functionCall.name,
      arguments: JSON.stringify(part.functionCall.args),
    },
  };
}

/**
 * Turns unwrapped CloudCode responses into OpenAI `chat.completion` objects.
 */
@Injectable()
export class ResponseTransformerService {
  transformResponse(
    payload: Record<string, unknown>,
    model: string,
    requestId: string,
  ): ChatCompletionResponse {
    const candidate = readCandidate(payload);
    const { content, toolCalls, reasoningContent } = this.extractContent(
      candidate?.parts ?? [],
    );

    const choice: ChatCompletionChoice = {
      index: 0,
      message: {
        role: 'assistant',
        content: content || null,
      },
      logprobs: null,
      finish_reason: mapFinishReason(candidate?.finishReason),
    };

    if (toolCalls.length > 0) {
      choice.message.tool_calls = toolCalls;
      choice.finish_reason = 'tool_calls';
    }

    if (reasoningContent) {
      choice.message.reasoning_content = reasoningContent;
    }

    const usage = readUsage(payload);
    return {
      id: requestId,
      object: 'chat.completion',
      created: Math.floor(Date.now() / 1000),
      model,
      system_fingerprint: null,
      choices: [choice],
      ...(usage ? { usage: toUsageInfo(usage) } : {}),
    };
  }

  extractContent(parts: ResponsePart[]): {
    content: string;
    toolCalls: ToolCallResponse[];
    reasoningContent: string;
  } {
    let content = '';
    let reasoningContent = '';
    const toolCalls: ToolCallResponse[] = [];

    for (const part of parts) {
      if (part.text) {
        if (part.thought) {
          reasoningContent += part.text;
        } else {
          content += part.text;
        }
      }
      const toolCall = toToolCall(part);
      if (toolCall) toolCalls.push(toolCall);
    }

    return { content, toolCalls, reasoningContent };
  }
}

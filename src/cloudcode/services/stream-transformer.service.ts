import { Injectable } from '@nestjs/common';
import {
  ChatCompletionChunk,
  ChatCompletionChunkChoice,
  FinishReason,
  ToolCallDelta,
  UsageInfo,
} from '../dto';
import {
  mapFinishReason,
  readCandidate,
  readUsage,
  toToolCall,
  toUsageInfo,
} from './response-transformer.service';

/**
 * State carried across the chunks of one streamed completion.
 */
export interface StreamAccumulator {
  toolIdx: number;
  hasToolCalls: boolean;
  /** Set once a chunk with a finish reason has been sent. */
  isComplete: boolean;
  finishReason: FinishReason | null;
  sentRole: boolean;
}

@Injectable()
export class StreamTransformerService {
  createStreamAccumulator(): StreamAccumulator {
    return {
      toolIdx: 0,
      hasToolCalls: false,
      isComplete: false,
      finishReason: null,
      sentRole: false,
    };
  }

  /**
   * Converts one unwrapped upstream event into a `chat.completion.chunk`,
   * or `null` when the event carries nothing to forward.
   */
  transformStreamChunk(
    payload: Record<string, unknown>,
    model: string,
    requestId: string,
    accumulator: StreamAccumulator,
  ): ChatCompletionChunk | null {
    const candidate = readCandidate(payload);
    const usageMetadata = readUsage(payload);
    const usage =
      usageMetadata && (usageMetadata.candidatesTokenCount ?? 0) > 0
        ? toUsageInfo(usageMetadata)
        : undefined;

    const delta: ChatCompletionChunkChoice['delta'] = {};
    const toolCalls: ToolCallDelta[] = [];

    for (const part of candidate?.parts ?? []) {
      if (part.text) {
        if (part.thought) {
          delta.reasoning_content = (delta.reasoning_content ?? '') + part.text;
        } else {
          delta.content = (delta.content ?? '') + part.text;
        }
      }
      const toolCall = toToolCall(part);
      if (toolCall) {
        toolCalls.push({ index: accumulator.toolIdx++, ...toolCall });
      }
    }

    if (toolCalls.length > 0) {
      accumulator.hasToolCalls = true;
      delta.tool_calls = toolCalls;
    }

    if (candidate?.finishReason && !accumulator.finishReason) {
      accumulator.finishReason = mapFinishReason(candidate.finishReason);
    }

    const hasDelta = Object.keys(delta).length > 0;
    const finishing =
      !accumulator.isComplete &&
      (Boolean(candidate?.finishReason) || usage !== undefined);
    if (!hasDelta && !finishing && !usage) {
      return null;
    }

    if (!accumulator.sentRole) {
      delta.role = 'assistant';
      accumulator.sentRole = true;
    }

    if (finishing) {
      accumulator.isComplete = true;
    }

    return this.buildChunk(
      requestId,
      model,
      delta,
      finishing ? this.determineFinalFinishReason(accumulator) : null,
      usage,
    );
  }

  createFinalChunk(
    requestId: string,
    model: string,
    accumulator: StreamAccumulator,
  ): ChatCompletionChunk {
    accumulator.isComplete = true;
    return this.buildChunk(
      requestId,
      model,
      accumulator.sentRole ? {} : { role: 'assistant' },
      this.determineFinalFinishReason(accumulator),
    );
  }

  private buildChunk(
    requestId: string,
    model: string,
    delta: ChatCompletionChunkChoice['delta'],
    finishReason: FinishReason | null,
    usage?: UsageInfo,
  ): ChatCompletionChunk {
    return {
      id: requestId,
      object: 'chat.completion.chunk',
      created: Math.floor(Date.now() / 1000),
      model,
      system_fingerprint: null,
      choices: [
        {
          index: 0,
          delta,
          logprobs: null,
          finish_reason: finishReason,
        },
      ],
      ...(usage ? { usage } : {}),
    };
  }

  private determineFinalFinishReason(
    accumulator: StreamAccumulator,
  ): FinishReason {
    if (accumulator.hasToolCalls) {
      return 'tool_calls';
    }
    return accumulator.finishReason ?? 'stop';
  }
}

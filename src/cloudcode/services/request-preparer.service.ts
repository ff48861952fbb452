import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  Content,
  ContentPart,
  GenerateContentRequest,
  SystemInstruction,
  Tool,
  isFunctionCallPart,
  isFunctionResponsePart,
} from '../interfaces';
import {
  IGNORED_PREAMBLE,
  REQUEST_TYPE_AGENT,
  REQUEST_USER_AGENT,
  SYSTEM_PREAMBLE,
} from '../constants';
import { deriveSessionId } from '../../common/utils';

const NAME_PREVIEW_LIMIT = 6;

function removeFirst(values: string[], target: string): void {
  const index = values.indexOf(target);
  if (index !== -1) {
    values.splice(index, 1);
  }
}

/**
 * Normalizes every outbound CloudCode request. The steps run in a fixed order
 * and mutate the request in place.
 */
@Injectable()
export class RequestPreparerService {
  private readonly logger = new Logger(RequestPreparerService.name);

  prepare(request: GenerateContentRequest): GenerateContentRequest {
    request.userAgent = REQUEST_USER_AGENT;
    request.requestType = REQUEST_TYPE_AGENT;
    if (!request.requestId) {
      request.requestId = `agent-${uuidv4()}`;
    }

    const inner = request.request;
    if (!inner.sessionId) {
      inner.sessionId = deriveSessionId(inner.contents);
    }

    const { contents, prunedParts, prunedContents } = this.sanitizeContents(
      inner.contents,
    );
    inner.contents = contents;
    if (prunedParts > 0 || prunedContents > 0) {
      this.logger.warn(
        `Removed empty content: parts=${prunedParts}, contents=${prunedContents}`,
      );
    }

    this.applyThinkingPreset(request);

    const defaulted = this.fillMissingParameters(inner.tools);
    if (defaulted.length > 0) {
      this.logger.warn(
        `Defaulted missing parameters for ${defaulted.length} tool(s): ${defaulted.slice(0, NAME_PREVIEW_LIMIT).join(',')}`,
      );
    }

    const callIds = this.ensureFunctionCallIds(inner.contents);
    if (callIds > 0) {
      this.logger.warn(`Generated ${callIds} missing functionCall id(s)`);
    }

    const responseIds = this.ensureFunctionResponseIds(inner.contents);
    if (responseIds > 0) {
      this.logger.warn(`Assigned ${responseIds} missing functionResponse id(s)`);
    }

    inner.systemInstruction = this.buildSystemInstruction(
      inner.systemInstruction,
    );

    return request;
  }

  sanitizeContents(contents: Content[]): {
    contents: Content[];
    prunedParts: number;
    prunedContents: number;
  } {
    let prunedParts = 0;
    let prunedContents = 0;
    const cleaned: Content[] = [];

    for (const content of contents) {
      const parts = content.parts.filter((part) => !this.isEmptyPart(part));
      prunedParts += content.parts.length - parts.length;

      if (parts.length === 0) {
        prunedContents++;
        continue;
      }
      cleaned.push({ ...content, parts });
    }

    return { contents: cleaned, prunedParts, prunedContents };
  }

  private isEmptyPart(part: ContentPart): boolean {
    if (isFunctionCallPart(part) || isFunctionResponsePart(part)) {
      return false;
    }
    return !part.text;
  }

  /**
   * Gemini variants named `-low` / `-high` take a thinking level; a budget
   * alongside it is rejected upstream.
   */
  applyThinkingPreset(request: GenerateContentRequest): void {
    const model = request.model.toLowerCase();
    if (!model.includes('gemini')) return;

    const level = model.includes('-low')
      ? 'low'
      : model.includes('-high')
        ? 'high'
        : undefined;
    if (!level) return;

    this.logger.debug(`Applied thinking preset: model=${request.model}, level=${level}`);

    const generationConfig = request.request.generationConfig ?? {};
    const thinkingConfig = generationConfig.thinkingConfig ?? {};
    thinkingConfig.thinkingLevel = level;
    delete thinkingConfig.thinkingBudget;
    generationConfig.thinkingConfig = thinkingConfig;
    request.request.generationConfig = generationConfig;
  }

  private fillMissingParameters(tools: Tool[] | undefined): string[] {
    const names: string[] = [];
    for (const tool of tools ?? []) {
      for (const declaration of tool.functionDeclarations) {
        if (!declaration.parameters) {
          declaration.parameters = { type: 'OBJECT' };
          names.push(declaration.name);
        }
      }
    }
    return names;
  }

  private ensureFunctionCallIds(contents: Content[]): number {
    let generated = 0;
    for (const content of contents) {
      for (const part of content.parts) {
        if (isFunctionCallPart(part) && !part.functionCall.id?.trim()) {
          part.functionCall.id = `toolu_${uuidv4()}`;
          generated++;
        }
      }
    }
    return generated;
  }

  /**
   * Pairs responses without an id with earlier calls. A response first takes
   * the oldest open call of its own name, then the oldest open call overall.
   * Responses that already carry an id close the matching call.
   */
  ensureFunctionResponseIds(contents: Content[]): number {
    const pending: string[] = [];
    const perName = new Map<string, string[]>();
    const nameById = new Map<string, string>();
    const queueFor = (name: string): string[] => {
      let queue = perName.get(name);
      if (!queue) {
        queue = [];
        perName.set(name, queue);
      }
      return queue;
    };

    let assignedCount = 0;

    for (const content of contents) {
      for (const part of content.parts) {
        if (isFunctionCallPart(part)) {
          const id = part.functionCall.id?.trim();
          if (!id) continue;
          pending.push(id);
          const name = part.functionCall.name.trim();
          if (name) {
            queueFor(name).push(id);
            nameById.set(id, name);
          }
          continue;
        }

        if (!isFunctionResponsePart(part)) continue;

        const response = part.functionResponse;
        const name = response.name.trim();
        const existing = response.id?.trim();

        if (existing) {
          removeFirst(pending, existing);
          const owner = nameById.get(existing) ?? name;
          if (owner) removeFirst(queueFor(owner), existing);
          continue;
        }

        let assigned = name ? queueFor(name).shift() : undefined;
        if (assigned) {
          removeFirst(pending, assigned);
        } else {
          assigned = pending.shift();
          const owner = assigned ? nameById.get(assigned) : undefined;
          if (assigned && owner) removeFirst(queueFor(owner), assigned);
        }

        if (assigned) {
          response.id = assigned;
          assignedCount++;
        }
      }
    }

    return assignedCount;
  }

  buildSystemInstruction(
    existing: SystemInstruction | undefined,
  ): SystemInstruction {
    const callerParts = (existing?.parts ?? [])
      .filter((part) => part.text)
      .map((part) => ({ text: part.text }));

    return {
      role: 'user',
      parts: [{ text: SYSTEM_PREAMBLE }, { text: IGNORED_PREAMBLE }, ...callerParts],
    };
  }
}

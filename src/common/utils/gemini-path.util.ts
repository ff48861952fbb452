import { GEMINI_ACTIONS, GeminiAction } from '../../cloudcode/constants';

const GEMINI_PATH_PATTERN = /v1(?:beta)?\/models\/([^/:]+):([^/?]+)/;

export interface GeminiPath {
  model: string;
  action: string;
}

/**
 * Extracts `{model, action}` from a `v1(beta)/models/{model}:{action}` path.
 */
export function parseGeminiPath(path: string): GeminiPath | null {
  const match = GEMINI_PATH_PATTERN.exec(path);
  if (!match) return null;

  const [, model, action] = match;
  return { model: decodeURIComponent(model), action };
}

export function isGeminiAction(action: string): action is GeminiAction {
  return GEMINI_ACTIONS.some((known) => known === action);
}

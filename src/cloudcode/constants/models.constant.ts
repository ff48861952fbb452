export const SUPPORTED_MODEL_FAMILIES = ['claude', 'gemini'] as const;

export type ModelFamily = (typeof SUPPORTED_MODEL_FAMILIES)[number];

export const MODEL_OWNERS: Record<ModelFamily, string> = {
  claude: 'anthropic',
  gemini: 'google',
};

export const GEMINI_ACTIONS = [
  'generateContent',
  'streamGenerateContent',
] as const;

export type GeminiAction = (typeof GEMINI_ACTIONS)[number];

export function modelFamily(modelId: string): ModelFamily | null {
  const lower = modelId.toLowerCase();
  return SUPPORTED_MODEL_FAMILIES.find((family) => lower.includes(family)) ?? null;
}

export function isSupportedModel(modelId: string): boolean {
  return modelFamily(modelId) !== null;
}

import { createOpenRouter } from "@openrouter/ai-sdk-provider";
import type { LanguageModel } from "ai";

export type FetchFunction = typeof globalThis.fetch;

export type ModelProviderSettings = {
  baseUrl: string;
  modelId: string;
  fetch?: FetchFunction;
};

/**
 * Builds a language model bound to one caller's OpenRouter key. A provider
 * instance is created per request because the credential differs per user.
 */
export const createUserLanguageModel = (
  settings: ModelProviderSettings,
  apiKey: string,
): LanguageModel => {
  const openRouter = createOpenRouter({
    apiKey,
    baseURL: settings.baseUrl,
    ...(settings.fetch ? { fetch: settings.fetch } : {}),
  });
  return openRouter(settings.modelId);
};

import { APICallError, generateText } from "ai";
import {
  createUserLanguageModel,
  type ModelProviderSettings,
} from "@/completions/model-provider";
import { describeError, logger } from "@/observability/logger";
import type {
  CompletionErrorKind,
  CompletionRequest,
  CompletionResult,
} from "@/types/contracts";

// Provider wording, not a stable contract. Status codes take precedence.
const INVALID_KEY_MESSAGE_PATTERN = /incorrect api key/i;
const AUTH_STATUS_CODES = new Set([401, 403]);
const TRANSIENT_STATUS_CODES = new Set([408, 409, 425, 429]);

const NETWORK_FAILURE =
  /network request|fetch failed|timeout|timed out|econn|socket hang up|und_err/i;

const describeProviderError = (error: unknown) =>
  APICallError.isInstance(error)
    ? `${error.message} ${error.responseBody ?? ""}`
    : describeError(error);

export const classifyCompletionError = (error: unknown): CompletionErrorKind => {
  if (INVALID_KEY_MESSAGE_PATTERN.test(describeProviderError(error))) {
    return "auth";
  }

  if (APICallError.isInstance(error)) {
    const statusCode = error.statusCode;
    if (statusCode !== undefined && AUTH_STATUS_CODES.has(statusCode)) {
      return "auth";
    }
    if (
      error.isRetryable ||
      (statusCode !== undefined &&
        (TRANSIENT_STATUS_CODES.has(statusCode) || statusCode >= 500))
    ) {
      return "transient";
    }
    return "unknown";
  }

  if (error instanceof Error && error.name === "AbortError") {
    return "transient";
  }

  return NETWORK_FAILURE.test(describeError(error)) ? "transient" : "unknown";
};

export type CompletionClient = {
  complete: (request: CompletionRequest) => Promise<CompletionResult>;
};

export type CompletionClientOptions = ModelProviderSettings & {
  systemPrompt: string;
};

export const createCompletionClient = (
  options: CompletionClientOptions,
): CompletionClient => ({
  complete: async ({ apiKey, userText }) => {
    try {
      const { text } = await generateText({
        model: createUserLanguageModel(options, apiKey),
        system: options.systemPrompt,
        prompt: userText,
        maxRetries: 0,
      });

      if (text.trim().length === 0) {
        return {
          ok: false,
          kind: "unknown",
          message: "Provider returned an empty completion.",
        };
      }

      return { ok: true, text };
    } catch (error) {
      const kind = classifyCompletionError(error);
      const statusCode = APICallError.isInstance(error) ? error.statusCode : undefined;
      logger.warn("Completion request failed.", {
        modelId: options.modelId,
        kind,
        statusCode,
        error: describeError(error),
      });

      return {
        ok: false,
        kind,
        message: describeError(error),
        ...(statusCode !== undefined ? { statusCode } : {}),
      };
    }
  },
});

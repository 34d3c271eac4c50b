import type { CompletionClient } from "@/completions/completion-client";
import type { CredentialStore } from "@/credentials/store";
import type { DispatchOutcome } from "@/types/contracts";

export type MessageDispatcher = {
  dispatch: (input: {
    userId: string;
    text: string;
    onCompletionStart?: () => Promise<void>;
  }) => Promise<DispatchOutcome>;
};

/**
 * Maps one chat message to one outcome. Holds no state between messages
 * beyond the credential lookup; failures are not retried.
 */
export const createMessageDispatcher = (deps: {
  store: CredentialStore;
  completions: CompletionClient;
}): MessageDispatcher => ({
  dispatch: async ({ userId, text, onCompletionStart }) => {
    const apiKey = await deps.store.get(userId);
    if (apiKey === null) {
      return { kind: "missing_key" };
    }

    await onCompletionStart?.();

    const result = await deps.completions.complete({
      apiKey,
      userText: text,
    });
    if (result.ok) {
      return { kind: "reply", text: result.text };
    }

    if (result.kind === "auth") {
      return { kind: "auth_error" };
    }
    return { kind: "provider_error", errorKind: result.kind };
  },
});

export type BotRunMode = "webhook" | "polling";

export type BotCommand = "start" | "setkey" | "mykey" | "delkey";

export type KeyPreview =
  | { status: "set"; preview: string }
  | { status: "missing" };

export type KeyRemoval = {
  removed: boolean;
};

export type CompletionErrorKind = "auth" | "transient" | "unknown";

export type CompletionRequest = {
  apiKey: string;
  userText: string;
};

export type CompletionResult =
  | { ok: true; text: string }
  | {
      ok: false;
      kind: CompletionErrorKind;
      message: string;
      statusCode?: number;
    };

export type DispatchOutcome =
  | { kind: "missing_key" }
  | { kind: "reply"; text: string }
  | { kind: "auth_error" }
  | { kind: "provider_error"; errorKind: Exclude<CompletionErrorKind, "auth"> };

export type IncomingTextMessage = {
  updateId: number;
  chatId: number;
  messageId: number;
  userId: number;
  firstName: string;
  text: string;
};

export type UpdateRouteResult =
  | { handled: true; route: BotCommand | "chat" }
  | {
      handled: false;
      reason: "no_text_message" | "unknown_command";
    };

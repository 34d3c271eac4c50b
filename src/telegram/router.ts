import type { Update } from "grammy/types";
import type { MessageDispatcher } from "@/chat/dispatcher";
import type { CredentialService } from "@/credentials/service";
import { describeError, logger } from "@/observability/logger";
import type { TelegramGateway } from "@/telegram/bot";
import {
  REPLY_TEXT,
  renderKeyPreviewHtml,
  renderStartHtml,
} from "@/telegram/replies";
import type {
  BotCommand,
  DispatchOutcome,
  IncomingTextMessage,
  UpdateRouteResult,
} from "@/types/contracts";

const COMMAND_ALIASES: Readonly<Partial<Record<string, BotCommand>>> = {
  "/start": "start",
  "/setkey": "setkey",
  "/mykey": "mykey",
  "/showkey": "mykey",
  "/delkey": "delkey",
  "/deletekey": "delkey",
};

export const BOT_COMMAND_MENU = [
  { command: "start", description: "How to use this bot" },
  { command: "setkey", description: "Save your OpenRouter API key" },
  { command: "mykey", description: "Show a masked preview of your key" },
  { command: "delkey", description: "Remove your stored key" },
] as const;

export const parseCommand = (text: string) => {
  const [rawCommand, ...args] = text.trim().split(/\s+/);
  const command = (rawCommand ?? "").toLowerCase().replace(/@[a-z0-9_]+$/, "");
  return {
    command,
    args,
  };
};

export const extractTextMessage = (update: Update): IncomingTextMessage | null => {
  const message = update.message;
  if (!message || typeof message.text !== "string" || !message.from) {
    return null;
  }

  return {
    updateId: update.update_id,
    chatId: message.chat.id,
    messageId: message.message_id,
    userId: message.from.id,
    firstName: message.from.first_name,
    text: message.text,
  };
};

const renderDispatchOutcome = (outcome: DispatchOutcome) => {
  switch (outcome.kind) {
    case "reply":
      return outcome.text;
    case "missing_key":
      return REPLY_TEXT.setKeyFirst;
    case "auth_error":
      return REPLY_TEXT.invalidKey;
    case "provider_error":
      return REPLY_TEXT.genericFailure;
  }
};

export type UpdateRouter = {
  routeUpdate: (update: Update) => Promise<UpdateRouteResult>;
};

export const createUpdateRouter = (deps: {
  credentials: CredentialService;
  dispatcher: MessageDispatcher;
  telegram: TelegramGateway;
}): UpdateRouter => {
  const { credentials, dispatcher, telegram } = deps;
  const logFor = (message: IncomingTextMessage) =>
    logger.child({ updateId: message.updateId, chatId: message.chatId });

  const handleSetKey = async (message: IncomingTextMessage, args: string[]) => {
    const apiKey = args[0];
    if (!apiKey) {
      await telegram.sendText(message.chatId, REPLY_TEXT.setKeyUsage);
      return;
    }

    const log = logFor(message);
    await credentials.setKey(String(message.userId), apiKey);
    log.info("API key set for user.", { userId: message.userId });

    try {
      await telegram.deleteMessage(message.chatId, message.messageId);
    } catch (error) {
      log.warn("Could not delete the message containing an API key.", {
        messageId: message.messageId,
        error: describeError(error),
      });
      await telegram.sendText(message.chatId, REPLY_TEXT.keySavedDeleteManually);
      return;
    }

    await telegram.sendText(message.chatId, REPLY_TEXT.keySavedAndDeleted);
  };

  const handleShowKey = async (message: IncomingTextMessage) => {
    const preview = await credentials.getPreview(String(message.userId));
    if (preview.status === "missing") {
      await telegram.sendText(message.chatId, REPLY_TEXT.noKeyToShow);
      return;
    }
    await telegram.sendHtml(message.chatId, renderKeyPreviewHtml(preview.preview));
  };

  const handleDeleteKey = async (message: IncomingTextMessage) => {
    const { removed } = await credentials.deleteKey(String(message.userId));
    await telegram.sendText(
      message.chatId,
      removed ? REPLY_TEXT.keyRemoved : REPLY_TEXT.noKeyToRemove,
    );
  };

  const handleChat = async (message: IncomingTextMessage) => {
    const log = logFor(message);
    const outcome = await dispatcher.dispatch({
      userId: String(message.userId),
      text: message.text,
      onCompletionStart: async () => {
        try {
          await telegram.sendTyping(message.chatId);
        } catch (error) {
          log.warn("Failed to send typing indicator.", {
            error: describeError(error),
          });
        }
      },
    });

    if (outcome.kind === "provider_error") {
      log.error("Completion failed for user.", {
        userId: message.userId,
        errorKind: outcome.errorKind,
      });
    }

    if (outcome.kind !== "reply") {
      await telegram.sendText(message.chatId, renderDispatchOutcome(outcome));
      return;
    }

    try {
      await telegram.sendText(message.chatId, outcome.text);
    } catch (error) {
      log.error("Failed to deliver the model reply.", {
        userId: message.userId,
        error: describeError(error),
      });
      await telegram.sendText(message.chatId, REPLY_TEXT.genericFailure);
    }
  };

  return {
    routeUpdate: async (update) => {
      const message = extractTextMessage(update);
      if (!message) {
        return { handled: false, reason: "no_text_message" };
      }

      if (!message.text.startsWith("/")) {
        await handleChat(message);
        return { handled: true, route: "chat" };
      }

      const { command, args } = parseCommand(message.text);
      const route = COMMAND_ALIASES[command];
      switch (route) {
        case "start":
          await telegram.sendHtml(message.chatId, renderStartHtml(message.firstName));
          break;
        case "setkey":
          await handleSetKey(message, args);
          break;
        case "mykey":
          await handleShowKey(message);
          break;
        case "delkey":
          await handleDeleteKey(message);
          break;
        case undefined:
          return { handled: false, reason: "unknown_command" };
      }

      return { handled: true, route };
    },
  };
};

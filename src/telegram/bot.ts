import { Bot, type Api } from "grammy";
import { describeError, logger } from "@/observability/logger";
import {
  hasLikelyMarkdownFormatting,
  isTelegramParseModeError,
  renderTelegramHtmlFromMarkdown,
} from "@/telegram/format";
import { chunkTelegramMessage, TELEGRAM_MAX_MESSAGE_CHARS } from "@/utils/chunk";

const RICH_TEXT_CHUNK_LENGTH = 3500;

export interface TelegramGateway {
  /** Plain text, split when longer than one message; Markdown rendering is opt-in. */
  sendText(chatId: number, text: string): Promise<void>;
  /** Pre-rendered Telegram HTML. */
  sendHtml(chatId: number, html: string): Promise<void>;
  deleteMessage(chatId: number, messageId: number): Promise<void>;
  sendTyping(chatId: number): Promise<void>;
}

export const createTelegramBot = (token: string) => {
  const bot = new Bot(token);
  bot.catch((error) => {
    logger.error("Unhandled grammY error.", {
      updateId: error.ctx.update.update_id,
      error: describeError(error.error),
    });
  });
  return bot;
};

type TelegramApi = Pick<Api, "sendMessage" | "deleteMessage" | "sendChatAction">;

export type TelegramGatewayOptions = {
  /** Render Markdown-looking text as Telegram HTML. Off: text is sent as is. */
  renderMarkdown?: boolean;
};

export const createTelegramGateway = (
  api: TelegramApi,
  options: TelegramGatewayOptions = {},
): TelegramGateway => ({
  sendText: async (chatId, text) => {
    if (!options.renderMarkdown || !hasLikelyMarkdownFormatting(text)) {
      for (const chunk of chunkTelegramMessage(text, TELEGRAM_MAX_MESSAGE_CHARS)) {
        await api.sendMessage(chatId, chunk);
      }
      return;
    }

    for (const chunk of chunkTelegramMessage(text, RICH_TEXT_CHUNK_LENGTH)) {
      try {
        await api.sendMessage(chatId, renderTelegramHtmlFromMarkdown(chunk), {
          parse_mode: "HTML",
        });
      } catch (error) {
        if (!isTelegramParseModeError(error)) {
          throw error;
        }

        logger.warn("Telegram parse mode failed; falling back to plain text.", {
          chatId,
          error: describeError(error),
        });
        await api.sendMessage(chatId, chunk);
      }
    }
  },
  sendHtml: async (chatId, html) => {
    await api.sendMessage(chatId, html, { parse_mode: "HTML" });
  },
  deleteMessage: async (chatId, messageId) => {
    await api.deleteMessage(chatId, messageId);
  },
  sendTyping: async (chatId) => {
    await api.sendChatAction(chatId, "typing");
  },
});

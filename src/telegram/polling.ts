import type { Bot } from "grammy";
import { describeError, logger } from "@/observability/logger";
import { withTelegramRetry } from "@/telegram/bootstrap";
import type { UpdateRouter } from "@/telegram/router";

const LONG_POLL_TIMEOUT_SECONDS = 30;

const wiredBots = new WeakSet<Bot>();

/** Feeds every polled update into `router`; safe to call more than once. */
const wireRouter = (bot: Bot, router: UpdateRouter) => {
  if (wiredBots.has(bot)) {
    return;
  }
  wiredBots.add(bot);
  bot.use(async (ctx, next) => {
    await router.routeUpdate(ctx.update);
    await next();
  });
};

// grammY's start() only settles when polling ends, so resolve on onStart.
const beginPolling = (bot: Bot) =>
  new Promise<void>((resolve, reject) => {
    let live = false;
    bot
      .start({
        timeout: LONG_POLL_TIMEOUT_SECONDS,
        allowed_updates: ["message"],
        drop_pending_updates: false,
        onStart: (me) => {
          live = true;
          logger.info("Telegram polling started.", { username: me.username });
          resolve();
        },
      })
      .catch((error: unknown) => {
        if (live) {
          logger.error("Telegram polling stopped unexpectedly.", {
            error: describeError(error),
          });
          return;
        }
        reject(error);
      });
  });

export const startPollingIngestion = async (bot: Bot, router: UpdateRouter) => {
  wireRouter(bot, router);
  await withTelegramRetry("startPolling", () => beginPolling(bot));
};

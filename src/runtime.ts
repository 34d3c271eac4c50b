import type { Bot } from "grammy";
import { buildServer, createAppServices, type AppServices } from "@/app";
import type { AppEnv } from "@/config/env";
import { describeError, logger } from "@/observability/logger";
import type { TelemetryHandle } from "@/observability/telemetry";
import {
  explainTelegramAuthError,
  isTransientTelegramError,
  withTelegramRetry,
} from "@/telegram/bootstrap";
import { createTelegramBot } from "@/telegram/bot";
import { startPollingIngestion } from "@/telegram/polling";
import { BOT_COMMAND_MENU } from "@/telegram/router";
import { WEBHOOK_PATH } from "@/telegram/webhook";

export const buildWebhookUrl = (appBaseUrl: string) => {
  const base = appBaseUrl.endsWith("/") ? appBaseUrl : `${appBaseUrl}/`;
  return new URL(WEBHOOK_PATH.slice(1), base).toString();
};

const registerCommandMenu = async (bot: Bot) => {
  try {
    await bot.api.setMyCommands(BOT_COMMAND_MENU.map((entry) => ({ ...entry })));
  } catch (error) {
    logger.warn("Failed to register the bot command menu.", {
      error: describeError(error),
    });
  }
};

const configureWebhook = async (bot: Bot, env: AppEnv) => {
  if (!env.APP_BASE_URL) {
    throw new Error("APP_BASE_URL is required in webhook mode.");
  }
  if (!env.TELEGRAM_WEBHOOK_SECRET) {
    logger.warn("TELEGRAM_WEBHOOK_SECRET is not set; webhook requests are not authenticated.");
  }

  const webhookUrl = buildWebhookUrl(env.APP_BASE_URL);
  const secret = env.TELEGRAM_WEBHOOK_SECRET;
  await withTelegramRetry("setWebhook", () =>
    bot.api.setWebhook(webhookUrl, {
      allowed_updates: ["message"],
      ...(secret ? { secret_token: secret } : {}),
    }),
  ).catch((error: unknown) => {
    throw explainTelegramAuthError(error);
  });
  logger.info("Webhook mode configured.", { webhookUrl });
};

const switchToPolling = async (bot: Bot, services: AppServices) => {
  try {
    await withTelegramRetry("deleteWebhook", () =>
      bot.api.deleteWebhook({ drop_pending_updates: false }),
    );
  } catch (error) {
    if (!isTransientTelegramError(error)) {
      throw explainTelegramAuthError(error);
    }
    logger.warn("deleteWebhook failed after retries; starting polling anyway.", {
      error: describeError(error),
    });
  }
  await startPollingIngestion(bot, services.router);
};

type ShutdownStep = { name: string; run: () => Promise<unknown> | void };

const runShutdown = async (steps: ShutdownStep[]) => {
  for (const step of steps) {
    try {
      await step.run();
    } catch (error) {
      logger.warn("Shutdown step failed.", { step: step.name, error: describeError(error) });
    }
  }
};

export const startRuntime = async ({
  env,
  telemetry,
}: {
  env: AppEnv;
  telemetry: TelemetryHandle;
}) => {
  const bot = createTelegramBot(env.TELEGRAM_BOT_TOKEN);
  const services = createAppServices(env, { bot });
  const app = buildServer(services, {
    ...(env.TELEGRAM_WEBHOOK_SECRET ? { webhookSecret: env.TELEGRAM_WEBHOOK_SECRET } : {}),
  });

  let stopping: Promise<void> | null = null;
  const stop = () => {
    if (stopping) {
      return stopping;
    }
    stopping = runShutdown([
      { name: "keep-alive", run: () => services.keepAlive?.stop() },
      { name: "polling", run: () => (bot.isRunning() ? bot.stop() : undefined) },
      { name: "http", run: () => app.close() },
      { name: "telemetry", run: () => telemetry.shutdown() },
      { name: "store", run: () => services.store.close() },
    ]);
    return stopping;
  };

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.once(signal, () => {
      logger.info(`${signal} received. Shutting down.`);
      void stop().then(() => {
        logger.info("Shut down cleanly.");
        process.exit(0);
      });
    });
  }

  try {
    await services.store.load();
    await app.listen({ host: "0.0.0.0", port: env.PORT });

    if (env.BOT_RUN_MODE === "webhook") {
      await configureWebhook(bot, env);
      await registerCommandMenu(bot);
    } else {
      await registerCommandMenu(bot);
      await switchToPolling(bot, services);
    }

    if (services.keepAlive) {
      services.keepAlive.start();
    } else {
      logger.info("KEEPALIVE_URL not set; keep-alive pings disabled.");
    }

    logger.info("Telegram relay service started.", {
      mode: env.BOT_RUN_MODE,
      port: env.PORT,
      model: env.AI_MODEL,
    });
  } catch (error) {
    await stop();
    throw error;
  }
};

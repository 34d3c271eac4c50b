import Fastify, { type FastifyInstance } from "fastify";
import type { Bot } from "grammy";
import { createMessageDispatcher } from "@/chat/dispatcher";
import {
  createCompletionClient,
  type CompletionClient,
} from "@/completions/completion-client";
import type { FetchFunction } from "@/completions/model-provider";
import { SYSTEM_PROMPT } from "@/completions/prompts";
import { SERVICE_NAME, type AppEnv } from "@/config/env";
import { createCredentialService } from "@/credentials/service";
import {
  SqliteCredentialStore,
  type CredentialStore,
} from "@/credentials/store";
import { createKeepAliveJob, type KeepAliveJob } from "@/jobs/keep-alive-job";
import {
  createTelegramBot,
  createTelegramGateway,
  type TelegramGateway,
} from "@/telegram/bot";
import { createUpdateRouter, type UpdateRouter } from "@/telegram/router";
import { registerWebhookRoute } from "@/telegram/webhook";

export type AppServices = {
  store: CredentialStore;
  completions: CompletionClient;
  telegram: TelegramGateway;
  router: UpdateRouter;
  keepAlive: KeepAliveJob | null;
};

export type ServiceOverrides = {
  store?: CredentialStore;
  completions?: CompletionClient;
  telegram?: TelegramGateway;
  fetch?: FetchFunction;
};

type ServiceConfig = Pick<
  AppEnv,
  | "CREDENTIALS_DB_PATH"
  | "CREDENTIAL_ENCRYPTION_KEY"
  | "TELEGRAM_BOT_TOKEN"
  | "OPENROUTER_BASE_URL"
  | "AI_MODEL"
  | "KEEPALIVE_URL"
  | "KEEPALIVE_INTERVAL_SECONDS"
  | "REPLY_MARKDOWN"
>;

/**
 * Wires every collaborator explicitly. `bot` is only needed when no
 * `telegram` override is given.
 */
export const createAppServices = (
  config: ServiceConfig,
  input: { bot?: Bot; overrides?: ServiceOverrides } = {},
): AppServices => {
  const overrides = input.overrides ?? {};
  const store =
    overrides.store ??
    new SqliteCredentialStore({
      path: config.CREDENTIALS_DB_PATH,
      encryptionSecret: config.CREDENTIAL_ENCRYPTION_KEY ?? config.TELEGRAM_BOT_TOKEN,
    });
  const completions =
    overrides.completions ??
    createCompletionClient({
      baseUrl: config.OPENROUTER_BASE_URL,
      modelId: config.AI_MODEL,
      systemPrompt: SYSTEM_PROMPT,
      ...(overrides.fetch ? { fetch: overrides.fetch } : {}),
    });
  const telegram =
    overrides.telegram ??
    createTelegramGateway((input.bot ?? createTelegramBot(config.TELEGRAM_BOT_TOKEN)).api, {
      renderMarkdown: config.REPLY_MARKDOWN,
    });

  const router = createUpdateRouter({
    credentials: createCredentialService(store),
    dispatcher: createMessageDispatcher({ store, completions }),
    telegram,
  });

  const keepAlive = config.KEEPALIVE_URL
    ? createKeepAliveJob({
        url: config.KEEPALIVE_URL,
        intervalMs: config.KEEPALIVE_INTERVAL_SECONDS * 1000,
        ...(overrides.fetch ? { fetch: overrides.fetch } : {}),
      })
    : null;

  return {
    store,
    completions,
    telegram,
    router,
    keepAlive,
  };
};

const LIVENESS_PAYLOAD = {
  ok: true,
  service: SERVICE_NAME,
} as const;

export const buildServer = (
  services: Pick<AppServices, "router">,
  options: { webhookSecret?: string } = {},
): FastifyInstance => {
  const app = Fastify({
    logger: false,
  });

  registerWebhookRoute(app, {
    router: services.router,
    ...(options.webhookSecret ? { webhookSecret: options.webhookSecret } : {}),
  });

  app.get("/", async () => LIVENESS_PAYLOAD);
  app.get("/healthz", async () => LIVENESS_PAYLOAD);

  return app;
};

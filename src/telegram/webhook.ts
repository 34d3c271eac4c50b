import type { Update } from "grammy/types";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { describeError, logger } from "@/observability/logger";
import { TELEGRAM_SECRET_HEADER, verifyWebhookSecret } from "@/security/webhook-auth";
import type { UpdateRouter } from "@/telegram/router";

export const WEBHOOK_PATH = "/telegram/webhook";

const isTelegramUpdate = (body: unknown): body is Update =>
  typeof body === "object" &&
  body !== null &&
  "update_id" in body &&
  typeof body.update_id === "number";

export const registerWebhookRoute = (
  app: FastifyInstance,
  deps: {
    router: UpdateRouter;
    webhookSecret?: string;
  },
) => {
  const handleWebhook = async (
    request: FastifyRequest<{ Params: { secret?: string } }>,
    reply: FastifyReply,
  ) => {
    const pathSecret = request.params.secret;
    const headerSecret = request.headers[TELEGRAM_SECRET_HEADER];

    if (!verifyWebhookSecret({ headerSecret, pathSecret }, deps.webhookSecret)) {
      logger.warn("Webhook request rejected due to secret mismatch.", {
        remoteAddress: request.ip,
        userAgent: request.headers["user-agent"],
        hasTelegramHeaderSecret: typeof headerSecret === "string",
        hasPathSecret: typeof pathSecret === "string",
      });
      return reply.code(401).send({ ok: false });
    }

    const body: unknown = request.body;
    if (!isTelegramUpdate(body)) {
      logger.warn("Webhook request rejected due to invalid payload.", {
        remoteAddress: request.ip,
        userAgent: request.headers["user-agent"],
      });
      return reply.code(400).send({ ok: false, error: "Invalid Telegram update" });
    }

    try {
      const result = await deps.router.routeUpdate(body);
      logger.debug("Webhook update routed.", { updateId: body.update_id, result });
    } catch (error) {
      // Acknowledge anyway: Telegram would otherwise redeliver the same update.
      logger.error("Failed to process webhook update.", {
        updateId: body.update_id,
        error: describeError(error),
      });
    }

    return reply.code(200).send({ ok: true });
  };

  app.post<{ Params: { secret?: string } }>(WEBHOOK_PATH, handleWebhook);
  app.post<{ Params: { secret?: string } }>(`${WEBHOOK_PATH}/:secret`, handleWebhook);
};

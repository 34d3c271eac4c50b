import { describeError, logger } from "@/observability/logger";

const KEEP_ALIVE_REQUEST_TIMEOUT_MS = 10_000;

export type KeepAliveJob = {
  start: () => void;
  stop: () => void;
  pingOnce: () => Promise<boolean>;
};

/**
 * Periodically GETs a monitoring URL so the hosting platform does not idle the
 * process. Failures are logged and otherwise ignored.
 */
export const createKeepAliveJob = (options: {
  url: string;
  intervalMs: number;
  fetch?: typeof globalThis.fetch;
}): KeepAliveJob => {
  const fetchImpl = options.fetch ?? globalThis.fetch;
  let timer: ReturnType<typeof setInterval> | null = null;
  let pingInFlight = false;

  const pingOnce = async () => {
    if (pingInFlight) {
      return false;
    }
    pingInFlight = true;
    try {
      const response = await fetchImpl(options.url, {
        method: "GET",
        signal: AbortSignal.timeout(KEEP_ALIVE_REQUEST_TIMEOUT_MS),
      });
      if (!response.ok) {
        logger.warn("Keep-alive ping returned a non-success status.", {
          url: options.url,
          status: response.status,
        });
        return false;
      }
      logger.debug("Keep-alive ping succeeded.", { url: options.url });
      return true;
    } catch (error) {
      logger.warn("Keep-alive ping failed.", {
        url: options.url,
        error: describeError(error),
      });
      return false;
    } finally {
      pingInFlight = false;
    }
  };

  return {
    start: () => {
      if (timer) {
        return;
      }
      timer = setInterval(() => {
        void pingOnce();
      }, options.intervalMs);
      timer.unref();
      void pingOnce();
      logger.info("Keep-alive job started.", {
        url: options.url,
        intervalMs: options.intervalMs,
      });
    },
    stop: () => {
      if (!timer) {
        return;
      }
      clearInterval(timer);
      timer = null;
    },
    pingOnce,
  };
};

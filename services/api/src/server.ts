import cors from "cors";
import express from "express";
import type { Express, NextFunction, Request, Response } from "express";
import rateLimit from "express-rate-limit";
import { randomUUID } from "node:crypto";
import {
  AppError,
  OperationRegistry,
  RegistrySynchronizer,
  SYSTEM_OWNER,
  consoleLogger,
  formatErrorForLog,
  type Logger,
  type PartitionStore
} from "@opsreg/core";
import { createPartitionStore } from "@opsreg/store";
import { loadApiConfig, type ApiConfig } from "./config";
import { registerOpsRoutes } from "./routes/ops";

export type ApiDependencies = {
  config: ApiConfig;
  store: PartitionStore;
  logger: Logger;
  now: () => Date;
};

export type ApiRuntime = {
  app: Express;
  deps: ApiDependencies;
  registry: OperationRegistry;
};

const INTERNAL_ERROR_MESSAGE = "An unexpected error occurred.";
const READY_PROBE_TAG = "__ready_probe__";
const REQUEST_ID_MAX_LENGTH = 128;
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;

type ReadyCheck = {
  status: "ok" | "error";
  message?: string;
};

function formatReadinessCheck(result: PromiseSettledResult<unknown>): ReadyCheck {
  if (result.status === "fulfilled") {
    return { status: "ok" };
  }

  const reason = result.reason;
  if (reason instanceof Error) {
    return { status: "error", message: reason.message };
  }

  return { status: "error", message: String(reason) };
}

// body-parser rejects malformed JSON with a SyntaxError carrying status 400.
function isMalformedBody(error: unknown): boolean {
  return error instanceof SyntaxError && "status" in error && error.status === 400;
}

export function createErrorHandler(logger: Logger) {
  return (error: unknown, _req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (error instanceof AppError) {
      res.status(error.status).json({
        error: {
          code: error.code,
          message: error.message
        }
      });
      return;
    }

    if (isMalformedBody(error)) {
      res.status(400).json({
        error: {
          code: "INVALID_JSON",
          message: "Request body is not valid JSON."
        }
      });
      return;
    }

    logger.error("api.error", { error: formatErrorForLog(error) });
    res.status(500).json({
      error: {
        code: "INTERNAL",
        message: INTERNAL_ERROR_MESSAGE
      }
    });
  };
}

export function createApiRuntime(incomingDeps?: Partial<ApiDependencies>): ApiRuntime {
  const config = incomingDeps?.config || loadApiConfig();
  const deps: ApiDependencies = {
    config,
    store:
      incomingDeps?.store ||
      createPartitionStore({
        driver: config.storeDriver,
        table: config.opsTable,
        redisUrl: config.redisUrl,
        postgresUrl: config.postgresUrl
      }),
    logger: incomingDeps?.logger || consoleLogger,
    now: incomingDeps?.now || (() => new Date())
  };
  const registry = new OperationRegistry(new RegistrySynchronizer({ store: deps.store, logger: deps.logger }));

  const app = express();

  app.use((req, res, next) => {
    const incomingRequestId = req.header("x-request-id")?.trim();
    const requestId =
      incomingRequestId &&
      incomingRequestId.length <= REQUEST_ID_MAX_LENGTH &&
      REQUEST_ID_PATTERN.test(incomingRequestId)
        ? incomingRequestId
        : randomUUID();
    res.setHeader("X-Request-ID", requestId);
    next();
  });

  app.use(
    cors({
      origin: deps.config.webOrigin,
      exposedHeaders: ["X-Request-ID"]
    })
  );
  app.use(express.json({ limit: "1mb" }));

  const writeLimiter = rateLimit({
    windowMs: deps.config.writeRateLimitWindowMs,
    limit: deps.config.writeRateLimitMax,
    handler: (_req, res) => {
      res.status(429).json({
        error: {
          code: "RATE_LIMITED",
          message: "Too many registry writes. Please wait."
        }
      });
    },
    standardHeaders: true,
    legacyHeaders: false
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/ready", async (_req, res) => {
    const [storeResult] = await Promise.allSettled([deps.store.getPartition(SYSTEM_OWNER, READY_PROBE_TAG)]);
    const checks = { store: formatReadinessCheck(storeResult) };
    const isReady = checks.store.status === "ok";

    res.status(isReady ? 200 : 503).json({
      status: isReady ? "ready" : "degraded",
      checks,
      timestamp: deps.now().toISOString()
    });
  });

  registerOpsRoutes(app, { config: deps.config, registry, writeLimiter });

  app.use(createErrorHandler(deps.logger));
  return { app, deps, registry };
}

export function createApiApp(incomingDeps?: Partial<ApiDependencies>): Express {
  return createApiRuntime(incomingDeps).app;
}

if (require.main === module) {
  const config = loadApiConfig();
  const runtime = createApiRuntime({ config });
  const { logger } = runtime.deps;
  const server = runtime.app.listen(config.port, () => {
    logger.info("api.started", { port: config.port, storeDriver: config.storeDriver });
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info("api.stopping", { signal });

    let exitCode = 0;
    try {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      });
    } catch (error) {
      exitCode = 1;
      logger.error("api.shutdown.server_close_failed", { error: formatErrorForLog(error) });
    }

    try {
      await runtime.deps.store.close();
    } catch (error) {
      exitCode = 1;
      logger.error("api.shutdown.store_close_failed", { error: formatErrorForLog(error) });
    }

    process.exit(exitCode);
  };

  process.on("SIGINT", () => {
    void shutdown("SIGINT");
  });
  process.on("SIGTERM", () => {
    void shutdown("SIGTERM");
  });
}

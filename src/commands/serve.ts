import type { Server } from "node:http";
import { loadConfig } from "../config.js";
import { createSummarizer } from "../llm/index.js";
import type { Summarizer } from "../llm/types.js";
import { createApp, startServer, stopServer } from "../server/app.js";
import { createLogger, type Logger } from "../utils/log.js";

export interface ServeOptions {
  port?: number;
  host?: string;
  provider?: string;
}

export async function runServe(options: ServeOptions, env: NodeJS.ProcessEnv = process.env) {
  const config = loadConfig(options.provider ? { ...env, SUMMARIZER_PROVIDER: options.provider } : env);
  const host = options.host?.trim() || config.server.host;
  const port = normalizePort(options.port) ?? config.server.port;
  const logger = createLogger("doc-summarizer", config.logLevel);

  // Loaded once; every request shares this instance.
  const summarizer = createSummarizer(config.summarizer);
  const app = createApp({ config: config.server, summarizer, logger });
  let server: Server;
  try {
    server = await startServer(app, host, port);
  } catch (error) {
    await releaseSummarizer(summarizer, logger).catch((closeError: unknown) => {
      logger.error("could not release the summarizer", closeError);
    });
    throw error;
  }

  logger.info(`listening on http://${host}:${port} (summarizer: ${summarizer.id})`);

  const onSignal = (signal: NodeJS.Signals) => {
    logger.info(`received ${signal}, shutting down`);
    shutdown(server, summarizer, logger).then(
      () => logger.info("stopped"),
      (error: unknown) => {
        logger.error("shutdown failed", error);
        process.exitCode = 1;
      },
    );
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  return server;
}

async function shutdown(server: Server, summarizer: Summarizer, logger: Logger): Promise<void> {
  await stopServer(server);
  await releaseSummarizer(summarizer, logger);
}

async function releaseSummarizer(summarizer: Summarizer, logger: Logger): Promise<void> {
  if (summarizer.close) {
    logger.info(`releasing ${summarizer.id} model`);
    await summarizer.close();
  }
}

function normalizePort(value?: number): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!Number.isInteger(value) || value < 0 || value > 65_535) {
    throw new Error("--port must be an integer between 0 and 65535");
  }
  return value;
}

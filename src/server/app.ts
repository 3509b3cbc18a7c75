import { readFile } from "node:fs/promises";
import type { Server } from "node:http";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import cors from "cors";
import express, { type ErrorRequestHandler, type RequestHandler } from "express";
import multer from "multer";
import { toErrorBody, ValidationError } from "../errors.js";
import { DocumentTextExtractor, type DocumentExtractor } from "../extract/extractor.js";
import type { ServerConfig } from "../config.js";
import type { Summarizer } from "../llm/types.js";
import { fileTooLargeMessage, MESSAGES, UPLOAD_FIELD, type SummarizeSuccessBody } from "../shared/contract.js";
import type { Logger } from "../utils/log.js";
import { escapeHtml } from "../utils/text.js";
import { handleSummarizeRequest, type UploadedDocument } from "./handler.js";

const PUBLIC_DIR = fileURLToPath(new URL("../../public/", import.meta.url));
// Compiled browser modules sit beside this file once built (dist/client, dist/shared).
const BUNDLE_DIR = fileURLToPath(new URL("../", import.meta.url));

export interface AppDeps {
  config: ServerConfig;
  summarizer: Summarizer;
  logger: Logger;
  extractor?: DocumentExtractor;
}

export function createApp(deps: AppDeps): express.Express {
  const { config, summarizer } = deps;
  const logger = deps.logger.child("http");
  const extractor = deps.extractor ?? new DocumentTextExtractor();

  const app = express();
  app.disable("x-powered-by");
  app.use(cors({ origin: config.corsOrigin }));

  app.get("/", renderIndex(config, logger));
  app.use(express.static(PUBLIC_DIR, { index: false }));
  app.use("/client", express.static(join(BUNDLE_DIR, "client")));
  app.use("/shared", express.static(join(BUNDLE_DIR, "shared")));

  app.post("/summarize", receiveUpload(config), async (req, res, next) => {
    try {
      const upload: UploadedDocument | undefined = req.file
        ? { bytes: req.file.buffer, mimeType: req.file.mimetype, fileName: req.file.originalname }
        : undefined;
      const summary = await handleSummarizeRequest(upload, {
        extractor,
        summarizer,
        tempDir: config.tempDir,
        maxInputChars: config.maxInputChars,
        logger: logger.child("summarize"),
      });
      const body: SummarizeSuccessBody = { summary };
      res.json(body);
    } catch (error) {
      next(error);
    }
  });

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found." });
  });

  const handleError: ErrorRequestHandler = (error: unknown, req, res, _next) => {
    const { status, body } = toErrorBody(error);
    if (status >= 500) {
      logger.error(`${req.method} ${req.path} failed`, error);
    } else {
      logger.warn(`${req.method} ${req.path} rejected: ${body.error}`);
    }
    res.status(status).json(body);
  };
  app.use(handleError);

  return app;
}

function receiveUpload(config: ServerConfig): RequestHandler {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: Math.floor(config.maxUploadMb * 1024 * 1024), files: 1 },
  }).single(UPLOAD_FIELD);

  return (req, res, next) => {
    upload(req, res, (error: unknown) => {
      if (error instanceof multer.MulterError) {
        const message = error.code === "LIMIT_FILE_SIZE" ? fileTooLargeMessage(config.maxUploadMb) : MESSAGES.unexpectedFiles;
        next(new ValidationError(message, { cause: error }));
        return;
      }
      next(error);
    });
  };
}

function renderIndex(config: ServerConfig, logger: Logger): RequestHandler {
  let template: Promise<string> | null = null;

  return async (_req, res, next) => {
    try {
      template ??= readFile(join(PUBLIC_DIR, "index.html"), "utf8");
      const html = (await template).replaceAll("%API_BASE_URL%", escapeHtml(config.publicApiBaseUrl));
      res.type("html").send(html);
    } catch (error) {
      template = null;
      logger.error("could not load the UI page", error);
      next(error);
    }
  };
}

export function startServer(app: express.Express, host: string, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once("listening", () => resolve(server));
    server.once("error", reject);
  });
}

export function stopServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

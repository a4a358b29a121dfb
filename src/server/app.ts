import express, {
  type ErrorRequestHandler,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import multer from "multer";
import { z } from "zod";
import {
  type AppError,
  BadRequestError,
  NotFoundError,
  ValidationError,
  toAppError,
} from "../errors.js";
import { logger } from "../logger.js";
import { parseDocument } from "../pipeline/documentParser.js";
import { extractPdfPages, type PdfExtraction } from "../pipeline/pdfExtractor.js";
import type { Result } from "../result.js";
import type { BillSession } from "../session/billSession.js";
import type { SessionStore } from "../session/sessionStore.js";

export interface AppDependencies {
  store: SessionStore;
  maxUploadBytes: number;
  /** Defaults to the unpdf extractor */
  extractPages?: (bytes: Uint8Array) => Promise<PdfExtraction>;
  /** Built frontend to serve, if any */
  staticDir?: string;
  version?: string;
}

export interface UploadResponse {
  sessionId: string;
  filename: string;
  pageCount: number;
  extractedPageCount: number;
  charCount: number;
}

const uploadBodySchema = z.object({ sessionId: z.string().uuid().optional() });
const analysisBodySchema = z.object({ force: z.boolean().optional() });
const questionBodySchema = z.object({ question: z.string().trim().min(1).max(2000) });

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

/** Express 4 does not await handlers; forward rejections to the error middleware */
const route =
  (fn: AsyncRoute) =>
  (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res).catch(next);
  };

export function createApp(deps: AppDependencies): express.Express {
  const { store } = deps;
  const extractPages = deps.extractPages ?? extractPdfPages;

  const app = express();
  app.use(express.json({ limit: "64kb" }));

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: deps.maxUploadBytes, files: 1 },
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", version: deps.version ?? "0.0.0" });
  });

  app.post(
    "/bills/upload",
    upload.single("file"),
    route(async (req, res) => {
      const file = req.file;
      if (!file) throw new BadRequestError('Attach a PDF in the "file" field');
      if (!looksLikePdf(file.buffer)) {
        throw new BadRequestError("Only PDF files are accepted");
      }
      const body = parseBody(uploadBodySchema, req.body);

      const extraction = await extractPages(new Uint8Array(file.buffer));
      const doc = parseDocument(extraction.pages, {
        filename: file.originalname,
        title: extraction.metadata.title,
      });
      const session = store.getOrCreate(body.sessionId);
      session.loadDocument(doc);

      const payload: UploadResponse = {
        sessionId: session.id,
        filename: doc.filename,
        pageCount: doc.pageCount,
        extractedPageCount: doc.extractedPageCount,
        charCount: doc.text.length,
      };
      res.status(201).json(payload);
    })
  );

  app.get("/bills/:sessionId", (req, res) => {
    res.json(findSession(store, req.params.sessionId).snapshot());
  });

  app.post("/bills/:sessionId/validation", (req, res) => {
    sendResult(res, findSession(store, req.params.sessionId).validate());
  });

  app.post(
    "/bills/:sessionId/analysis",
    route(async (req, res) => {
      const session = findSession(store, req.params.sessionId);
      const body = parseBody(analysisBodySchema, req.body ?? {});
      sendResult(res, await session.generateAnalysis({ force: body.force }));
    })
  );

  app.post(
    "/bills/:sessionId/questions",
    route(async (req, res) => {
      const session = findSession(store, req.params.sessionId);
      const body = parseBody(questionBodySchema, req.body);
      const answer = await session.askQuestion(body.question);
      if (!answer.ok) return sendResult(res, answer);
      res.json({ answer: answer.value });
    })
  );

  app.get("/bills/:sessionId/summary.pdf", (req, res) => {
    const pdf = findSession(store, req.params.sessionId).exportSummaryPdf();
    if (!pdf.ok) throw pdf.error;

    res
      .status(200)
      .type("application/pdf")
      .attachment("Bill_Summary.pdf")
      .send(Buffer.from(pdf.value));
  });

  if (deps.staticDir) {
    app.use(express.static(deps.staticDir));
  }

  app.use((_req, _res, next) => next(new NotFoundError("Route not found")));
  app.use(errorHandler);

  return app;
}

const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  const appError =
    err instanceof multer.MulterError
      ? new BadRequestError(`Upload rejected: ${err.message}`)
      : toAppError(err);

  if (appError.statusCode >= 500) {
    logger.error("Request failed", {
      code: appError.code,
      message: appError.message,
      method: req.method,
      url: req.originalUrl,
    });
  }
  res.status(appError.statusCode).json({ error: appError.toJSON() });
};

function findSession(store: SessionStore, id: string | undefined): BillSession {
  const session = id ? store.get(id) : undefined;
  if (!session) throw new NotFoundError("Session not found or expired: upload the bill again");
  return session;
}

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) throw ValidationError.fromZodError(parsed.error);
  return parsed.data;
}

function sendResult<T>(res: Response, result: Result<T, AppError>): void {
  if (!result.ok) {
    res.status(result.error.statusCode).json({ error: result.error.toJSON() });
    return;
  }
  res.json(result.value);
}

function looksLikePdf(buf: Buffer): boolean {
  return buf.length > 4 && buf.subarray(0, 5).toString("latin1") === "%PDF-";
}

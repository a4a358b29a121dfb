import {
  type AppError,
  BadRequestError,
  LlmFailedError,
  NotFoundError,
  ValidationError,
  isAppError,
  toAppError,
} from "../errors.js";
import type { LanguageModelClient } from "../llm/client.js";
import { logger } from "../logger.js";
import { answerQuestion, runAnalysis } from "../pipeline/index.js";
import type { ValidatorOptions } from "../pipeline/billValidator.js";
import { validateBill } from "../pipeline/billValidator.js";
import { renderSummaryPdf } from "../pipeline/pdfExporter.js";
import { Err, Ok, type Result, tryCatch } from "../result.js";
import type {
  AnalysisRun,
  BillDocument,
  CompletedAnalysis,
  RejectedAnalysis,
  ValidationResult,
} from "../types.js";

export interface BillSessionOptions {
  /** Resolves the model client; throws ConfigurationError when unconfigured */
  getClient: () => LanguageModelClient;
  validation?: ValidatorOptions;
  promptCharLimit?: number;
}

export interface SessionSnapshot {
  sessionId: string;
  document: Omit<BillDocument, "pages" | "text"> & { charCount: number } | null;
  validation: ValidationResult | null;
  analysis: CompletedAnalysis | null;
}

/**
 * State for one user's bill: the current document, its last validation and
 * the last completed analysis. Replaced wholesale when a differently named
 * file is uploaded. Failures come back as Result values; state is only
 * written after an operation succeeds.
 */
export class BillSession {
  private document: BillDocument | null = null;
  private validation: ValidationResult | null = null;
  private analysis: CompletedAnalysis | null = null;

  constructor(
    readonly id: string,
    private readonly options: BillSessionOptions
  ) {}

  get currentDocument(): BillDocument | null {
    return this.document;
  }

  get currentAnalysis(): CompletedAnalysis | null {
    return this.analysis;
  }

  /**
   * A different filename discards the previous validation and analysis.
   * Re-uploading the same filename keeps the analysis and refreshes the text.
   */
  loadDocument(doc: BillDocument): void {
    if (this.document?.filename !== doc.filename) {
      this.validation = null;
      this.analysis = null;
    }
    this.document = doc;
    logger.info("Bill loaded", {
      sessionId: this.id,
      filename: doc.filename,
      pages: doc.pageCount,
      extractedPages: doc.extractedPageCount,
      chars: doc.text.length,
    });
  }

  /** Runs the validator without contacting the model. */
  validate(): Result<ValidationResult, AppError> {
    if (!this.document) return Err(new BadRequestError("Upload a bill PDF first"));
    this.validation = validateBill(this.document.text, this.options.validation);
    return Ok(this.validation);
  }

  /**
   * A rejected bill is reported before the model client is resolved, so a
   * missing API key never hides the validator's verdict.
   */
  async generateAnalysis(
    options: { force?: boolean } = {}
  ): Promise<Result<AnalysisRun, AppError>> {
    const doc = this.document;
    if (!doc) return Err(new BadRequestError("Upload a bill PDF first"));

    const validation = validateBill(doc.text, this.options.validation);
    if (!validation.accepted && !options.force) {
      this.validation = validation;
      logger.info("Bill rejected by validator", {
        sessionId: this.id,
        classification: validation.classification,
      });
      const rejected: RejectedAnalysis = { status: "rejected", validation };
      return Ok(rejected);
    }

    const client = this.resolveClient();
    if (!client.ok) return client;

    const run = await tryCatch(
      () =>
        runAnalysis(doc, client.value, {
          validation: this.options.validation,
          promptCharLimit: this.options.promptCharLimit,
          force: options.force,
        }),
      asModelError
    );
    if (!run.ok) return run;

    const outcome = run.value;
    this.validation = outcome.validation;
    if (outcome.status === "completed") {
      this.analysis = outcome;
      logger.info("Bill analysis completed", {
        sessionId: this.id,
        forced: outcome.forced,
        missingSections: outcome.missing.join(","),
        durationMs: Math.round(outcome.durationMs),
      });
    }
    return run;
  }

  async askQuestion(question: string): Promise<Result<string, AppError>> {
    if (!question.trim()) {
      return Err(new ValidationError("Question must not be empty", [
        { field: "question", message: "Required" },
      ]));
    }
    const doc = this.document;
    if (!doc) return Err(new BadRequestError("Upload a bill PDF first"));

    const client = this.resolveClient();
    if (!client.ok) return client;

    return tryCatch(
      () =>
        answerQuestion(doc, question, client.value, {
          promptCharLimit: this.options.promptCharLimit,
        }),
      asModelError
    );
  }

  exportSummaryPdf(): Result<Uint8Array, AppError> {
    if (!this.analysis) {
      return Err(new NotFoundError("No analysis yet: generate an analysis first"));
    }
    return Ok(renderSummaryPdf(this.analysis.sections.detailedSummary));
  }

  snapshot(): SessionSnapshot {
    const doc = this.document;
    return {
      sessionId: this.id,
      document: doc && {
        id: doc.id,
        filename: doc.filename,
        title: doc.title,
        pageCount: doc.pageCount,
        extractedPageCount: doc.extractedPageCount,
        charCount: doc.text.length,
      },
      validation: this.validation,
      analysis: this.analysis,
    };
  }

  private resolveClient(): Result<LanguageModelClient, AppError> {
    try {
      return Ok(this.options.getClient());
    } catch (error: unknown) {
      const appError = toAppError(error);
      logger.warn("Model client unavailable", { sessionId: this.id, code: appError.code });
      return Err(appError);
    }
  }
}

function asModelError(error: unknown): AppError {
  if (isAppError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new LlmFailedError(`Language model request failed: ${message}`);
}

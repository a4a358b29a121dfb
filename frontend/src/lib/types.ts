// Shared with the server: the API serialises these shapes as-is
export type {
  AnalysisRun,
  BillSectionKey,
  CompletedAnalysis,
  ImpactGroupKey,
  ValidationClassification,
  ValidationResult,
} from "../../../src/types";
export type { SerializedError } from "../../../src/errors";
export type { SessionSnapshot } from "../../../src/session/billSession";
export type { UploadResponse } from "../../../src/server/app";

export interface QuestionAnswer {
  question: string;
  answer: string;
}

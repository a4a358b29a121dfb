import { useCallback, useState } from "react";
import { api } from "../lib/api";
import type { CompletedAnalysis, ValidationResult } from "../lib/types";
import { errorMessage } from "../lib/utils";

export type BillStatus =
  | "idle"
  | "uploading"
  | "validating"
  | "ready"
  | "analyzing"
  | "analyzed";

interface BillState {
  sessionId: string | null;
  filename: string | null;
  pageCount: number;
  extractedPageCount: number;
  charCount: number;
  status: BillStatus;
  validation: ValidationResult | null;
  analysis: CompletedAnalysis | null;
  uploadError: string | null;
  analysisError: string | null;
}

const INITIAL: BillState = {
  sessionId: null,
  filename: null,
  pageCount: 0,
  extractedPageCount: 0,
  charCount: 0,
  status: "idle",
  validation: null,
  analysis: null,
  uploadError: null,
  analysisError: null,
};

export function useBill() {
  const [state, setState] = useState<BillState>(INITIAL);

  const upload = useCallback(
    async (file: File) => {
      setState((s) => ({ ...s, status: "uploading", uploadError: null, analysisError: null }));
      try {
        const uploaded = await api.uploadBill(file, state.sessionId);
        setState((s) => ({
          ...s,
          ...uploaded,
          validation: null,
          analysis: null,
          status: "validating",
        }));

        const validation = await api.validateBill(uploaded.sessionId);
        // Same filename keeps the server-side analysis
        const snapshot = await api.getBill(uploaded.sessionId);
        setState((s) => ({
          ...s,
          validation,
          analysis: snapshot.analysis,
          status: snapshot.analysis ? "analyzed" : "ready",
        }));
      } catch (err) {
        setState((s) => ({
          ...s,
          status: s.analysis ? "analyzed" : s.sessionId ? "ready" : "idle",
          uploadError: errorMessage(err),
        }));
      }
    },
    [state.sessionId]
  );

  const analyze = useCallback(
    async (force = false) => {
      const { sessionId } = state;
      if (!sessionId) return;
      setState((s) => ({ ...s, status: "analyzing", analysisError: null }));
      try {
        const run = await api.generateAnalysis(sessionId, force);
        setState((s) =>
          run.status === "completed"
            ? { ...s, validation: run.validation, analysis: run, status: "analyzed" }
            : { ...s, validation: run.validation, status: "ready" }
        );
      } catch (err) {
        setState((s) => ({
          ...s,
          status: s.analysis ? "analyzed" : "ready",
          analysisError: errorMessage(err),
        }));
      }
    },
    [state]
  );

  return { ...state, upload, analyze };
}

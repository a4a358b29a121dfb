import type {
  AnalysisRun,
  SerializedError,
  SessionSnapshot,
  UploadResponse,
  ValidationResult,
} from "./types";

const BASE = "";  // proxied via vite dev server → http://localhost:8000

export class ApiError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string
  ) {
    super(message);
    this.name = "ApiError";
  }
}

async function request<T>(path: string, init?: RequestInit): Promise<T> {
  const res = await fetch(`${BASE}${path}`, init);
  if (!res.ok) {
    const body: { error?: Partial<SerializedError> } = await res.json().catch(() => ({}));
    throw new ApiError(
      res.status,
      body.error?.code ?? "HTTP_ERROR",
      body.error?.message ?? `HTTP ${res.status}`
    );
  }
  return res.json();
}

function postJson<T>(path: string, body: unknown = {}): Promise<T> {
  return request<T>(path, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

export const api = {
  /** Upload a bill PDF; pass the current session to keep it */
  uploadBill(file: File, sessionId?: string | null): Promise<UploadResponse> {
    const fd = new FormData();
    if (sessionId) fd.append("sessionId", sessionId);
    fd.append("file", file);
    return request<UploadResponse>("/bills/upload", { method: "POST", body: fd });
  },

  getBill(sessionId: string): Promise<SessionSnapshot> {
    return request<SessionSnapshot>(`/bills/${sessionId}`);
  },

  /** Heuristic check only; no model call */
  validateBill(sessionId: string): Promise<ValidationResult> {
    return postJson<ValidationResult>(`/bills/${sessionId}/validation`);
  },

  generateAnalysis(sessionId: string, force = false): Promise<AnalysisRun> {
    return postJson<AnalysisRun>(`/bills/${sessionId}/analysis`, { force });
  },

  askQuestion(sessionId: string, question: string): Promise<{ answer: string }> {
    return postJson<{ answer: string }>(`/bills/${sessionId}/questions`, { question });
  },

  summaryPdfUrl(sessionId: string): string {
    return `${BASE}/bills/${sessionId}/summary.pdf`;
  },
};

import { clsx, type ClassValue } from "clsx";
import type { ValidationClassification } from "./types";

export function cn(...inputs: ClassValue[]) {
  return clsx(inputs);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function seconds(ms: number) {
  return `${(ms / 1000).toFixed(1)}s`;
}

export type TextCoverage = "none" | "partial" | "complete";

/** How much of an uploaded PDF came through with a text layer */
export function textCoverage(pageCount: number, extractedPageCount: number): TextCoverage {
  if (pageCount === 0 || extractedPageCount === 0) return "none";
  return extractedPageCount < pageCount ? "partial" : "complete";
}

export const CLASSIFICATION_CONFIG: Record<
  ValidationClassification,
  { label: string; color: string; dot: string }
> = {
  accepted: {
    label: "Parliamentary bill",
    color: "bg-emerald-900/30 text-emerald-300 border-emerald-500/30",
    dot: "bg-emerald-500",
  },
  likely: {
    label: "Possible bill",
    color: "bg-amber-900/30 text-amber-300 border-amber-500/30",
    dot: "bg-amber-500",
  },
  example: {
    label: "Example text",
    color: "bg-red-900/30 text-red-300 border-red-500/30",
    dot: "bg-red-500",
  },
  too_short: {
    label: "Too short",
    color: "bg-red-900/30 text-red-300 border-red-500/30",
    dot: "bg-red-500",
  },
  invalid: {
    label: "Not a bill",
    color: "bg-red-900/30 text-red-300 border-red-500/30",
    dot: "bg-red-500",
  },
};

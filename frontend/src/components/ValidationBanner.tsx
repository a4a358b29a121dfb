import { AlertTriangle, CheckCircle2, Loader2 } from "lucide-react";
import type { ValidationResult } from "../lib/types";
import { CLASSIFICATION_CONFIG, cn } from "../lib/utils";

interface ValidationBannerProps {
  validation: ValidationResult;
  analyzing: boolean;
  /** Runs the analysis despite a rejection */
  onForce: () => void;
}

export function ValidationBanner({ validation, analyzing, onForce }: ValidationBannerProps) {
  const config = CLASSIFICATION_CONFIG[validation.classification];
  const Icon = validation.accepted ? CheckCircle2 : AlertTriangle;

  return (
    <div className={cn("rounded-xl border px-4 py-3 space-y-3", config.color)}>
      <div className="flex items-start gap-3">
        <Icon className="w-5 h-5 shrink-0 mt-0.5" />
        <div className="min-w-0 flex-1 space-y-1">
          <div className="flex items-center gap-2">
            <span className={cn("w-2 h-2 rounded-full", config.dot)} />
            <span className="text-sm font-semibold">{config.label}</span>
          </div>
          <p className="text-sm opacity-90">{validation.reason}</p>
          {validation.matchedIndicators.length > 0 && (
            <p className="text-xs opacity-70">
              Found: {validation.matchedIndicators.join(", ")}
            </p>
          )}
        </div>
      </div>

      {!validation.accepted && (
        <div className="flex items-center justify-between gap-3 border-t border-current/20 pt-3">
          <p className="text-xs opacity-80">
            Kindly upload a Government / Parliamentary Bill PDF, or analyse this file anyway.
          </p>
          <button
            type="button"
            onClick={onForce}
            disabled={analyzing}
            className="shrink-0 flex items-center gap-1.5 text-xs font-semibold px-3 py-1.5 rounded-lg border border-current/40 hover:bg-white/10 disabled:opacity-50 disabled:cursor-not-allowed transition-colors"
          >
            {analyzing && <Loader2 className="w-3.5 h-3.5 animate-spin" />}
            Analyse anyway
          </button>
        </div>
      )}
    </div>
  );
}

import type { ReactNode } from "react";
import { ChevronRight, Landmark, Loader2, Sparkles } from "lucide-react";
import { AnalysisTabs } from "./components/AnalysisTabs";
import { BillUpload } from "./components/BillUpload";
import { PipelineFlow, type Outcome, type PipelineStep, type StepStatus } from "./components/PipelineFlow";
import { QuestionBox } from "./components/QuestionBox";
import { ValidationBanner } from "./components/ValidationBanner";
import { type BillStatus, useBill } from "./hooks/useBill";
import { CLASSIFICATION_CONFIG, cn, seconds } from "./lib/utils";

// Map bill status → step statuses for the flow diagram
function buildSteps(
  status: BillStatus,
  rejected: boolean,
  uploadFailed: boolean,
  analysisFailed: boolean
): PipelineStep[] {
  const stepDefs: Array<Omit<PipelineStep, "status">> = [
    { id: "upload",   label: "Upload PDF",        sublabel: "multipart upload, %PDF- check" },
    { id: "extract",  label: "Extract Text",      sublabel: "unpdf, page by page" },
    { id: "validate", label: "Validate Bill",     sublabel: "legislative indicators + keywords" },
    { id: "analyze",  label: "Generate Analysis", sublabel: "one LLM call, fixed prompt" },
    { id: "sections", label: "Extract Sections",  sublabel: "header-based section parser" },
  ];

  let statuses: StepStatus[];

  switch (status) {
    case "idle":       statuses = [uploadFailed ? "error" : "idle","idle","idle","idle","idle"]; break;
    case "uploading":  statuses = ["active","active","idle","idle","idle"]; break;
    case "validating": statuses = ["done","done","active","idle","idle"]; break;
    case "ready":      statuses = ["done","done",rejected ? "error" : "done",analysisFailed ? "error" : "idle","idle"]; break;
    case "analyzing":  statuses = ["done","done","done","active","idle"]; break;
    case "analyzed":   statuses = ["done","done","done","done","done"]; break;
    default:           statuses = ["idle","idle","idle","idle","idle"];
  }

  return stepDefs.map((s, i) => ({ ...s, status: statuses[i] ?? "idle" }));
}

export default function App() {
  const bill = useBill();
  const rejected = bill.validation !== null && !bill.validation.accepted;
  const steps = buildSteps(bill.status, rejected, bill.uploadError !== null, bill.analysisError !== null);
  const outcome: Outcome =
    bill.status === "analyzed" ? "ready" : bill.status === "ready" && rejected ? "rejected" : null;

  const analyzing = bill.status === "analyzing";
  const canAnalyze = bill.sessionId !== null && (bill.status === "ready" || bill.status === "analyzed");

  return (
    <div className="min-h-full bg-slate-950 text-slate-100 font-sans">
      {/* Header */}
      <header className="border-b border-slate-800/80 bg-slate-900/60 backdrop-blur-sm sticky top-0 z-10">
        <div className="max-w-7xl mx-auto px-6 py-3 flex items-center gap-3">
          <Landmark className="w-6 h-6 text-brand-500" />
          <span className="font-bold text-lg tracking-tight">bill-auditor</span>
          <span className="text-slate-600 text-sm">·</span>
          <span className="text-slate-400 text-sm">Parliament Bill Analysis</span>

          {analyzing && (
            <div className="ml-auto flex items-center gap-2 text-sm text-brand-400">
              <Loader2 className="w-4 h-4 animate-spin" />
              Analysing bill…
            </div>
          )}
          {bill.status === "analyzed" && (
            <div className="ml-auto flex items-center gap-1.5 text-sm text-emerald-400">
              <span className="w-2 h-2 rounded-full bg-emerald-500 animate-pulse" />
              Analysis ready
            </div>
          )}
        </div>
      </header>

      <main className="max-w-7xl mx-auto px-6 py-8 space-y-8">
        {/* Pipeline flow diagram */}
        <section className="space-y-3">
          <SectionHeader step={1} title="Pipeline" subtitle="Live status of each processing stage" />
          <div className="h-[420px] rounded-2xl bg-white/95 overflow-hidden">
            <PipelineFlow steps={steps} outcome={outcome} />
          </div>
        </section>

        <div className="grid grid-cols-1 lg:grid-cols-3 gap-6">
          {/* Left col: upload, validation, analysis */}
          <div className="lg:col-span-2 space-y-6">
            <Card>
              <SectionHeader step={2} title="Upload Bill" subtitle="Drop a Government / Parliamentary Bill PDF" />
              <div className="mt-4 space-y-4">
                <BillUpload
                  onUpload={bill.upload}
                  uploading={bill.status === "uploading"}
                  filename={bill.filename}
                  pageCount={bill.pageCount}
                  extractedPageCount={bill.extractedPageCount}
                  charCount={bill.charCount}
                  error={bill.uploadError}
                />
                {bill.validation && (
                  <ValidationBanner
                    validation={bill.validation}
                    analyzing={analyzing}
                    onForce={() => void bill.analyze(true)}
                  />
                )}
              </div>
            </Card>

            <Card>
              <SectionHeader step={3} title="Analysis" subtitle="Sector, summary and impact in simple language" />
              <div className="mt-4 space-y-4">
                <button
                  type="button"
                  onClick={() => void bill.analyze()}
                  disabled={!canAnalyze || analyzing}
                  className="flex items-center gap-2 rounded-lg bg-brand-600 hover:bg-brand-500 disabled:opacity-50 disabled:cursor-not-allowed text-white font-semibold text-sm px-4 py-2.5 transition-colors"
                >
                  {analyzing ? <Loader2 className="w-4 h-4 animate-spin" /> : <Sparkles className="w-4 h-4" />}
                  {analyzing ? "Analysing…" : "Generate Analysis"}
                </button>

                {bill.analysisError && (
                  <div className="rounded-lg bg-red-900/30 border border-red-500/30 px-3 py-2 text-sm text-red-300">
                    {bill.analysisError}
                  </div>
                )}

                {bill.sessionId && bill.analysis ? (
                  <AnalysisTabs sessionId={bill.sessionId} analysis={bill.analysis} />
                ) : (
                  <EmptyState
                    message={
                      bill.sessionId === null
                        ? "Upload a bill PDF first"
                        : rejected
                        ? "This file does not look like a bill"
                        : "Generate an analysis to see the results"
                    }
                  />
                )}
              </div>
            </Card>
          </div>

          {/* Right col: questions + stats */}
          <div className="space-y-6">
            <Card>
              <SectionHeader step={4} title="Ask a Question" subtitle="Answered from the bill text only" />
              <div className="mt-4">
                {bill.sessionId ? (
                  <QuestionBox key={bill.sessionId} sessionId={bill.sessionId} />
                ) : (
                  <EmptyState message="Upload a bill PDF first" />
                )}
              </div>
            </Card>

            {bill.sessionId && (
              <Card>
                <p className="text-xs font-semibold text-slate-400 uppercase tracking-wide mb-3">
                  Bill Summary
                </p>
                <div className="space-y-2">
                  {[
                    ["Pages",            `${bill.extractedPageCount} / ${bill.pageCount}`],
                    ["Characters",       bill.charCount.toLocaleString()],
                    ["Classification",   bill.validation ? CLASSIFICATION_CONFIG[bill.validation.classification].label : "–"],
                    ["Strong indicators", bill.validation?.strongIndicatorCount ?? "–"],
                    ["Keywords",         bill.validation?.keywordCount ?? "–"],
                    ["Model",            bill.analysis?.model ?? "–"],
                    ["Analysis time",    bill.analysis ? seconds(bill.analysis.durationMs) : "–"],
                  ].map(([label, value]) => (
                    <div key={String(label)} className="flex justify-between text-sm">
                      <span className="text-slate-400">{label}</span>
                      <span className={cn("font-medium text-slate-200", label === "Model" && "font-mono text-xs")}>
                        {value}
                      </span>
                    </div>
                  ))}
                </div>
                {bill.analysis?.forced && (
                  <p className="mt-3 text-xs text-amber-400/80">Analysed despite failing validation.</p>
                )}
                {bill.analysis?.promptTruncated && (
                  <p className="mt-1 text-xs text-slate-500">Only the beginning of a long bill was analysed.</p>
                )}
              </Card>
            )}
          </div>
        </div>
      </main>
    </div>
  );
}

function Card({ children }: { children: ReactNode }) {
  return (
    <div className="rounded-2xl bg-slate-900/70 border border-slate-800/80 p-5 backdrop-blur-sm">
      {children}
    </div>
  );
}

function SectionHeader({ step, title, subtitle }: { step: number; title: string; subtitle: string }) {
  return (
    <div className="flex items-center gap-3">
      <span className="shrink-0 w-7 h-7 rounded-full bg-brand-600/30 border border-brand-500/40 flex items-center justify-center text-xs font-bold text-brand-300">
        {step}
      </span>
      <div>
        <h2 className="text-base font-semibold text-slate-100 leading-none">{title}</h2>
        <p className="text-xs text-slate-500 mt-0.5">{subtitle}</p>
      </div>
    </div>
  );
}

function EmptyState({ message }: { message: string }) {
  return (
    <div className="flex flex-col items-center justify-center gap-2 py-10 text-center">
      <ChevronRight className="w-6 h-6 text-slate-700" />
      <p className="text-sm text-slate-500">{message}</p>
    </div>
  );
}

import { useState } from "react";
import { ChevronDown, Download } from "lucide-react";
import {
  BILL_SECTIONS,
  IMPACT_GROUPS,
  SECTION_NOT_AVAILABLE,
} from "../../../src/pipeline/sectionExtractor";
import { api } from "../lib/api";
import type { BillSectionKey, CompletedAnalysis } from "../lib/types";
import { cn } from "../lib/utils";

type Tab = "sector" | "summary" | "impact";

const TABS: Array<{ id: Tab; label: string }> = [
  { id: "sector", label: "Sector" },
  { id: "summary", label: "Summary" },
  { id: "impact", label: "Impact" },
];

const IMPACT_EXTRAS: BillSectionKey[] = ["beneficiaries", "affectedGroups", "positives", "risks"];

interface AnalysisTabsProps {
  sessionId: string;
  analysis: CompletedAnalysis;
}

export function AnalysisTabs({ sessionId, analysis }: AnalysisTabsProps) {
  const [tab, setTab] = useState<Tab>("sector");
  const [showDetail, setShowDetail] = useState(false);
  const { sections, impact } = analysis;

  return (
    <div className="space-y-5">
      <div className="flex gap-1 rounded-lg bg-slate-800/60 p-1 w-fit">
        {TABS.map((t) => (
          <button
            key={t.id}
            type="button"
            onClick={() => setTab(t.id)}
            className={cn(
              "px-4 py-1.5 rounded-md text-sm font-medium transition-colors",
              tab === t.id
                ? "bg-brand-600 text-white"
                : "text-slate-400 hover:text-slate-200"
            )}
          >
            {t.label}
          </button>
        ))}
      </div>

      {tab === "sector" && (
        <Block title={BILL_SECTIONS.definitions.sector.label} text={sections.sector} large />
      )}

      {tab === "summary" && (
        <div className="space-y-4">
          <Block title={BILL_SECTIONS.definitions.objective.label} text={sections.objective} />

          <div className="rounded-xl border border-slate-700/60">
            <button
              type="button"
              onClick={() => setShowDetail((v) => !v)}
              className="w-full flex items-center justify-between px-4 py-3 text-sm font-semibold text-slate-200"
            >
              {BILL_SECTIONS.definitions.detailedSummary.label}
              <ChevronDown className={cn("w-4 h-4 transition-transform", showDetail && "rotate-180")} />
            </button>
            {showDetail && (
              <div className="border-t border-slate-700/60 px-4 py-3 space-y-4">
                <SectionText text={sections.detailedSummary} />
                {sections.detailedSummary !== SECTION_NOT_AVAILABLE && (
                  <a
                    href={api.summaryPdfUrl(sessionId)}
                    download="Bill_Summary.pdf"
                    className="inline-flex items-center gap-2 rounded-lg bg-brand-600 hover:bg-brand-500 text-white text-sm font-semibold px-3 py-2 transition-colors"
                  >
                    <Download className="w-4 h-4" />
                    Download PDF
                  </a>
                )}
              </div>
            )}
          </div>
        </div>
      )}

      {tab === "impact" && (
        <div className="space-y-5">
          <div className="grid grid-cols-1 md:grid-cols-2 gap-4">
            {IMPACT_GROUPS.order.map((key) => (
              <Block key={key} title={IMPACT_GROUPS.definitions[key].label} text={impact[key]} />
            ))}
          </div>
          <div className="grid grid-cols-1 md:grid-cols-2 gap-4">
            {IMPACT_EXTRAS.map((key) => (
              <Block key={key} title={BILL_SECTIONS.definitions[key].label} text={sections[key]} />
            ))}
          </div>
        </div>
      )}

      {analysis.missing.length > 0 && (
        <p className="text-xs text-amber-400/80">
          The model skipped {analysis.missing.length} section
          {analysis.missing.length === 1 ? "" : "s"}:{" "}
          {analysis.missing.map((k) => BILL_SECTIONS.definitions[k].label).join(", ")}
        </p>
      )}
    </div>
  );
}

function Block({ title, text, large = false }: { title: string; text: string; large?: boolean }) {
  return (
    <div className="rounded-xl bg-slate-800/40 border border-slate-700/60 px-4 py-3">
      <p className="text-xs font-semibold text-slate-400 uppercase tracking-wide mb-2">{title}</p>
      <SectionText text={text} large={large} />
    </div>
  );
}

function SectionText({ text, large = false }: { text: string; large?: boolean }) {
  if (text === SECTION_NOT_AVAILABLE || text === "") {
    return <p className="text-sm italic text-slate-500">{SECTION_NOT_AVAILABLE}</p>;
  }
  return (
    <p className={cn("whitespace-pre-line text-slate-200", large ? "text-2xl font-semibold" : "text-sm leading-relaxed")}>
      {text}
    </p>
  );
}

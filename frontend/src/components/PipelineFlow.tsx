/**
 * n8n-style vertical pipeline flow: upload → extract → validate, then either
 * a rejection or model analysis → section extraction.
 */
import {
  ReactFlow,
  Background,
  BackgroundVariant,
  type Edge,
  type Node,
  type NodeProps,
  MarkerType,
  Handle,
  Position,
} from "@xyflow/react";
import "@xyflow/react/dist/style.css";
import {
  FileUp,
  FileText,
  ShieldCheck,
  Cpu,
  ListTree,
  CheckCircle2,
  XCircle,
} from "lucide-react";
import { cn } from "../lib/utils";

export type StepStatus = "idle" | "active" | "done" | "error";

export type StepId = "upload" | "extract" | "validate" | "analyze" | "sections";

export type PipelineStep = {
  id: StepId;
  label: string;
  sublabel: string;
  status: StepStatus;
};

export type Outcome = "ready" | "rejected" | null;

type StepNodeData = PipelineStep;
type ForkNodeData = { active: boolean };
type OutcomeNodeData = { variant: "ready" | "rejected"; active: boolean };

type StepFlowNode = Node<StepNodeData, "step">;
type ForkFlowNode = Node<ForkNodeData, "fork">;
type OutcomeFlowNode = Node<OutcomeNodeData, "outcome">;
type FlowNode = StepFlowNode | ForkFlowNode | OutcomeFlowNode;

const STEP_ICONS = {
  upload: FileUp,
  extract: FileText,
  validate: ShieldCheck,
  analyze: Cpu,
  sections: ListTree,
} satisfies Record<StepId, unknown>;

const STATUS_STYLES: Record<StepStatus, { border: string; indicator: string; icon: string }> = {
  idle: {
    border: "border-gray-200",
    indicator: "bg-gray-300",
    icon: "bg-gray-50 text-gray-400",
  },
  active: {
    border: "border-blue-400 shadow-sm shadow-blue-100",
    indicator: "bg-blue-500 animate-pulse",
    icon: "bg-blue-50 text-blue-600",
  },
  done: {
    border: "border-emerald-300",
    indicator: "bg-emerald-500",
    icon: "bg-emerald-50 text-emerald-600",
  },
  error: {
    border: "border-red-300",
    indicator: "bg-red-500",
    icon: "bg-red-50 text-red-600",
  },
};

const HANDLE = "!bg-gray-300 !border-gray-400 !w-2.5 !h-2.5";

function StepNode({ data }: NodeProps<StepFlowNode>) {
  const { id, label, sublabel, status } = data;
  const styles = STATUS_STYLES[status];
  const Icon = STEP_ICONS[id];

  return (
    <div
      className={cn(
        "relative w-[280px] rounded-lg border-2 bg-white px-5 py-4 transition-all duration-300",
        styles.border
      )}
    >
      <Handle type="target" position={Position.Top} className={cn(HANDLE, "!-top-[6px]")} />
      <div className="flex items-center gap-4">
        <div className={cn("shrink-0 w-10 h-10 rounded-lg flex items-center justify-center", styles.icon)}>
          <Icon className="w-5 h-5" />
        </div>
        <div className="min-w-0 flex-1">
          <div className="flex items-center gap-2">
            <span className="text-sm font-semibold text-gray-900">{label}</span>
            <span className={cn("shrink-0 w-2 h-2 rounded-full", styles.indicator)} />
          </div>
          <p className="text-xs mt-0.5 leading-snug text-gray-500">{sublabel}</p>
        </div>
      </div>
      <Handle type="source" position={Position.Bottom} className={cn(HANDLE, "!-bottom-[6px]")} />
    </div>
  );
}

function ForkNode({ data }: NodeProps<ForkFlowNode>) {
  return (
    <div
      className={cn(
        "w-10 h-10 rounded-full border-2 flex items-center justify-center transition-all duration-300",
        data.active
          ? "border-blue-400 bg-blue-50 text-blue-600"
          : "border-gray-300 bg-white text-gray-400"
      )}
    >
      <Handle type="target" position={Position.Top} className={cn(HANDLE, "!-top-[6px]")} />
      <svg className="w-4 h-4" viewBox="0 0 24 24" fill="none" stroke="currentColor" strokeWidth="2">
        <path d="M6 3v12M18 3v6M6 21a3 3 0 100-6 3 3 0 000 6zM18 12a3 3 0 100-6 3 3 0 000 6z" />
        <path d="M18 9a9 9 0 01-9 9" />
      </svg>
      <Handle type="source" id="right" position={Position.Right} className={HANDLE} />
      <Handle type="source" id="bottom" position={Position.Bottom} className={cn(HANDLE, "!-bottom-[6px]")} />
    </div>
  );
}

const OUTCOMES = {
  ready: {
    bg: "bg-emerald-50 border-emerald-200",
    text: "text-emerald-700",
    Icon: CheckCircle2,
    label: "Analysis ready",
    sub: "Sector · Summary · Impact",
  },
  rejected: {
    bg: "bg-red-50 border-red-200",
    text: "text-red-700",
    Icon: XCircle,
    label: "Not a bill",
    sub: "No model call made",
  },
};

function OutcomeNode({ data }: NodeProps<OutcomeFlowNode>) {
  const config = OUTCOMES[data.variant];

  return (
    <div
      className={cn(
        "rounded-lg border-2 px-4 py-3 w-[180px] transition-opacity duration-300",
        config.bg,
        !data.active && "opacity-50"
      )}
    >
      <Handle type="target" position={Position.Left} className={HANDLE} />
      <Handle type="target" id="top" position={Position.Top} className={cn(HANDLE, "!-top-[6px]")} />
      <div className={cn("font-semibold text-sm flex items-center gap-2", config.text)}>
        <config.Icon className="w-4 h-4" />
        {config.label}
      </div>
      <p className="text-xs text-gray-500 mt-0.5">{config.sub}</p>
    </div>
  );
}

const nodeTypes = { step: StepNode, fork: ForkNode, outcome: OutcomeNode };

interface PipelineFlowProps {
  /** In order: upload, extract, validate, analyze, sections */
  steps: PipelineStep[];
  outcome: Outcome;
}

const X_CENTER = 140;
const GAP_Y = 120;

const baseEdge = { stroke: "#d1d5db", strokeWidth: 1.5 };
const activeEdge = { stroke: "#3b82f6", strokeWidth: 2 };

export function PipelineFlow({ steps, outcome }: PipelineFlowProps) {
  const status = (id: StepId) => steps.find((s) => s.id === id)?.status ?? "idle";
  const step = (id: StepId, y: number): StepFlowNode => {
    const found = steps.find((s) => s.id === id);
    return {
      id,
      type: "step",
      position: { x: X_CENTER, y },
      data: found ?? { id, label: id, sublabel: "", status: "idle" },
    };
  };

  const validated = status("validate") === "done" || status("validate") === "error";
  const nodes: FlowNode[] = [
    step("upload", 0),
    step("extract", GAP_Y),
    step("validate", GAP_Y * 2),
    { id: "fork", type: "fork", position: { x: X_CENTER + 120, y: GAP_Y * 3 }, data: { active: validated } },
    { id: "out-rejected", type: "outcome", position: { x: X_CENTER + 290, y: GAP_Y * 3 - 20 }, data: { variant: "rejected", active: outcome === "rejected" } },
    step("analyze", GAP_Y * 4),
    step("sections", GAP_Y * 5),
    { id: "out-ready", type: "outcome", position: { x: X_CENTER + 50, y: GAP_Y * 6 }, data: { variant: "ready", active: outcome === "ready" } },
  ];

  function edge(id: string, source: string, target: string, from: StepId, extra: Partial<Edge> = {}): Edge {
    const style = status(from) === "done" ? activeEdge : baseEdge;
    return {
      id,
      source,
      target,
      animated: status(from) === "done",
      style,
      markerEnd: { type: MarkerType.ArrowClosed, color: style.stroke },
      ...extra,
    };
  }

  const edges: Edge[] = [
    edge("e-upload-extract", "upload", "extract", "upload"),
    edge("e-extract-validate", "extract", "validate", "extract"),
    edge("e-validate-fork", "validate", "fork", "validate"),
    {
      id: "e-fork-rejected", source: "fork", target: "out-rejected", sourceHandle: "right",
      style: { stroke: "#ef4444", strokeWidth: 1.5 },
      markerEnd: { type: MarkerType.ArrowClosed, color: "#ef4444" },
      label: "rejected", labelStyle: { fill: "#dc2626", fontSize: 11, fontFamily: "Inter" },
    },
    edge("e-fork-analyze", "fork", "analyze", "validate", {
      sourceHandle: "bottom",
      label: "accepted / forced",
      labelStyle: { fill: "#059669", fontSize: 11, fontFamily: "Inter" },
    }),
    edge("e-analyze-sections", "analyze", "sections", "analyze"),
    edge("e-sections-ready", "sections", "out-ready", "sections", { targetHandle: "top" }),
  ];

  return (
    <ReactFlow
      nodes={nodes}
      edges={edges}
      nodeTypes={nodeTypes}
      fitView
      fitViewOptions={{ padding: 0.3 }}
      nodesDraggable={false}
      nodesConnectable={false}
      elementsSelectable={false}
      panOnDrag={true}
      zoomOnScroll={false}
      minZoom={0.4}
      maxZoom={1.5}
      proOptions={{ hideAttribution: true }}
    >
      <Background variant={BackgroundVariant.Dots} gap={20} size={1} color="#e5e7eb" />
    </ReactFlow>
  );
}

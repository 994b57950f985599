import { AlertTriangle, Info } from "lucide-react";
import type { ReactNode } from "react";
import { Panel } from "./panel.js";

export type NoticeTone = "info" | "error";

export interface NoticeProps {
  tone?: NoticeTone;
  children: ReactNode;
  detail?: ReactNode;
}

const iconByTone: Record<NoticeTone, ReactNode> = {
  info: <Info className="h-4 w-4 text-cyan-300" />,
  error: <AlertTriangle className="h-4 w-4 text-rose-300" />,
};

export function Notice({ tone = "info", children, detail }: NoticeProps) {
  return (
    <Panel
      tone={tone === "error" ? "danger" : "info"}
      role={tone === "error" ? "alert" : "status"}
      className="flex items-start gap-3 px-4 py-3 text-sm text-slate-200"
    >
      <span className="mt-0.5">{iconByTone[tone]}</span>
      <div>
        <p>{children}</p>
        {detail ? <p className="mt-1 text-xs text-slate-400">{detail}</p> : null}
      </div>
    </Panel>
  );
}

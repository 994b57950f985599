import type { ReactNode } from "react";
import { cn } from "./lib/cn.js";

export interface FieldProps {
  label?: ReactNode;
  htmlFor?: string;
  /** Short explanation shown under the control. */
  help?: ReactNode;
  error?: ReactNode;
  className?: string;
  children: ReactNode;
}

export function Field({ label, htmlFor, help, error, className, children }: FieldProps) {
  return (
    <div className={cn("flex flex-col gap-1 text-sm text-slate-300", className)}>
      {label ? (
        <label htmlFor={htmlFor} className="font-medium text-slate-200">
          {label}
        </label>
      ) : null}
      {children}
      {help ? <span className="text-xs text-slate-400">{help}</span> : null}
      {error ? (
        <span role="alert" className="text-xs text-rose-300">
          {error}
        </span>
      ) : null}
    </div>
  );
}

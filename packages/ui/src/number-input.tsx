import { useEffect, useState, type InputHTMLAttributes } from "react";
import { clampToBounds, type NumericBounds } from "./lib/clamp.js";
import { cn } from "./lib/cn.js";

export interface NumberInputProps
  extends Omit<
    InputHTMLAttributes<HTMLInputElement>,
    "type" | "value" | "onChange" | "min" | "max" | "step"
  > {
  value: number;
  onChange: (value: number) => void;
  bounds: NumericBounds;
}

/**
 * Numeric stepper that never reports a value outside `bounds`. Typing is
 * free-form; the value is clamped when the field loses focus.
 */
export function NumberInput({
  value,
  onChange,
  bounds,
  className,
  onBlur,
  ...props
}: NumberInputProps) {
  const [draft, setDraft] = useState(String(value));

  useEffect(() => {
    setDraft(String(value));
  }, [value]);

  return (
    <input
      type="number"
      inputMode="decimal"
      min={bounds.min}
      max={bounds.max}
      step={bounds.step}
      value={draft}
      onChange={(event) => setDraft(event.target.value)}
      onBlur={(event) => {
        const next = clampToBounds(draft, bounds, value);
        setDraft(String(next));
        if (next !== value) onChange(next);
        onBlur?.(event);
      }}
      className={cn(
        "w-full rounded-lg border border-white/10 bg-slate-950/60 px-3 py-2 text-slate-100 outline-none transition placeholder:text-slate-500 focus:border-cyan-300/40 focus:bg-slate-950/80",
        className,
      )}
      {...props}
    />
  );
}

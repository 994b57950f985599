import { LoaderCircle } from "lucide-react";
import { forwardRef, type ButtonHTMLAttributes, type ReactNode } from "react";
import { cn } from "./lib/cn.js";

export interface ButtonProps extends ButtonHTMLAttributes<HTMLButtonElement> {
  variant?: "primary" | "secondary" | "ghost";
  leadingIcon?: ReactNode;
  /** Shows a spinner and blocks clicks while an action is running. */
  busy?: boolean;
}

const variantClasses: Record<NonNullable<ButtonProps["variant"]>, string> = {
  primary: "border-cyan-300/30 bg-cyan-400/15 text-cyan-100 hover:bg-cyan-400/20",
  secondary: "border-white/15 bg-white/5 text-slate-200 hover:bg-white/10",
  ghost: "border-transparent bg-transparent text-slate-200 hover:bg-white/5",
};

export const Button = forwardRef<HTMLButtonElement, ButtonProps>(function Button(
  {
    className,
    variant = "secondary",
    type = "button",
    leadingIcon,
    busy = false,
    disabled,
    children,
    ...props
  },
  ref,
) {
  return (
    <button
      ref={ref}
      type={type}
      disabled={disabled || busy}
      aria-busy={busy}
      className={cn(
        "inline-flex w-full items-center justify-center gap-2 rounded-lg border px-4 py-2.5 text-sm font-medium transition disabled:cursor-not-allowed disabled:opacity-60",
        variantClasses[variant],
        className,
      )}
      {...props}
    >
      {busy ? <LoaderCircle className="h-4 w-4 animate-spin" /> : leadingIcon}
      {children}
    </button>
  );
});

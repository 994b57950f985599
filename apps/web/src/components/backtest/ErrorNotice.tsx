import type { AnyBacktestError } from "@repo/backtest-client";
import { Notice } from "@repo/ui";
import { describeError } from "../../lib/error-message";

export function ErrorNotice({ error, apiUrl }: { error: AnyBacktestError; apiUrl: string }) {
  const { title, message, hint } = describeError(error, apiUrl);

  return (
    <Notice tone="error" detail={hint}>
      <span className="font-semibold">{title}:</span> {message}
    </Notice>
  );
}

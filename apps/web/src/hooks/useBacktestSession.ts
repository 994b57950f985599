import { useEffect, useSyncExternalStore } from "react";
import type { BacktestSession, SessionState } from "@repo/backtest-session";

/**
 * Binds a session to React and triggers exchange discovery on mount.
 * `start()` is a no-op once exchanges are loaded, so a StrictMode double
 * mount issues a single request.
 */
export function useBacktestSession(session: BacktestSession): SessionState {
  const state = useSyncExternalStore(session.subscribe, session.getState);

  useEffect(() => {
    void session.start();
  }, [session]);

  return state;
}

import {
  BacktestApiClient,
  createConsoleLogger,
  fromViteEnv,
  loadClientSettings,
  type ClientSettings,
} from "@repo/backtest-client";
import { BacktestSession } from "@repo/backtest-session";

export function getClientSettings(): ClientSettings {
  return loadClientSettings(fromViteEnv(import.meta.env));
}

/** One session per mounted app; nothing is shared between sessions. */
export function createBacktestSession(
  settings: ClientSettings = getClientSettings(),
): BacktestSession {
  const client = new BacktestApiClient({
    baseUrl: settings.apiUrl,
    logger: createConsoleLogger("backtest-client", settings.logLevel),
  });

  return new BacktestSession({
    gateway: client,
    logger: createConsoleLogger("backtest-session", settings.logLevel),
  });
}

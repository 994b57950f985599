/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_BACKTEST_API_URL?: string;
  readonly VITE_BACKTEST_LOG_LEVEL?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}

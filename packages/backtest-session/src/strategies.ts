import { StrategySchema, type Strategy } from "@repo/backtest-client";

export const STRATEGIES: readonly Strategy[] = StrategySchema.options;

export interface StrategyInfo {
  label: string;
  family: "traditional" | "advanced";
  description: string;
}

export const STRATEGY_INFO: Record<Strategy, StrategyInfo> = {
  RSI: {
    label: "RSI",
    family: "traditional",
    description: "Buy when RSI crosses above the buy threshold, sell when it crosses below the sell threshold.",
  },
  MA: {
    label: "MA",
    family: "traditional",
    description: "Enter on a price crossover above (long) or below (short) the moving average.",
  },
  RAMSEY: {
    label: "Ramsey",
    family: "advanced",
    description: "Correlation cliques across a basket of assets.",
  },
  KAGE: {
    label: "Kage",
    family: "advanced",
    description: "Shadow logic: rolling volatility for regime changes.",
  },
  KITSUNE: {
    label: "Kitsune",
    family: "advanced",
    description: "Fox's beam: pattern matching on price changes.",
  },
  RYU: {
    label: "Ryu",
    family: "advanced",
    description: "Dragon's theory: a fractal/chaos metric proxy.",
  },
  SAKURA: {
    label: "Sakura",
    family: "advanced",
    description: "Cherry blossom mirror: median pivot with regression on price segments.",
  },
  HIKARI: {
    label: "Hikari",
    family: "advanced",
    description: "Advance of light: momentum from principal components of returns.",
  },
  TENSHI: {
    label: "Tenshi",
    family: "advanced",
    description: "Angel's geometry: support and resistance from local extrema.",
  },
  ZEN: {
    label: "Zen",
    family: "advanced",
    description: "Zen rhythm: Bollinger Bands with normalized phase and momentum.",
  },
};

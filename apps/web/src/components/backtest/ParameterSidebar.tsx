import { useId } from "react";
import { Play, RefreshCw } from "lucide-react";
import {
  PARAMETER_RANGES,
  TradeTypeSchema,
  type Strategy,
  type TradeType,
} from "@repo/backtest-client";
import {
  STRATEGIES,
  STRATEGY_INFO,
  isBusy,
  symbolsStatus,
  type SessionState,
  type WidgetValues,
} from "@repo/backtest-session";
import {
  Button,
  Field,
  Notice,
  NumberInput,
  Panel,
  Select,
  Switch,
  TextInput,
  type SelectOption,
} from "@repo/ui";

interface ParameterSidebarProps {
  state: SessionState;
  widgets: WidgetValues;
  onWidgetsChange: (widgets: WidgetValues) => void;
  onSelectExchange: (exchange: string) => void;
  onFetchSymbols: () => void;
  onSelectSymbol: (symbol: string) => void;
  onRetryExchanges: () => void;
  onSubmit: () => void;
}

const tradeTypeOptions: SelectOption<TradeType>[] = TradeTypeSchema.options.map((value) => ({
  value,
  label: value === "long" ? "Long" : "Short",
}));

const strategyOptions: SelectOption<Strategy>[] = STRATEGIES.map((strategy) => ({
  value: strategy,
  label: STRATEGY_INFO[strategy].label,
  description: STRATEGY_INFO[strategy].description,
}));

function toOptions(values: readonly string[]): SelectOption[] {
  return values.map((value) => ({ value, label: value }));
}

export function ParameterSidebar({
  state,
  widgets,
  onWidgetsChange,
  onSelectExchange,
  onFetchSymbols,
  onSelectSymbol,
  onRetryExchanges,
  onSubmit,
}: ParameterSidebarProps) {
  const ids = useId();
  const busy = isBusy(state);
  const loadedMessage = symbolsStatus(state);
  const set = <K extends keyof WidgetValues>(key: K, value: WidgetValues[K]) =>
    onWidgetsChange({ ...widgets, [key]: value });

  return (
    <Panel as="aside" className="space-y-5 p-5" aria-label="Backtest parameters">
      <h2 className="text-lg font-semibold text-slate-100">Backtest Parameters</h2>

      <Field label="Exchange" htmlFor={`${ids}-exchange`}>
        <Select
          id={`${ids}-exchange`}
          value={state.selectedExchange}
          onChange={onSelectExchange}
          options={toOptions(state.exchanges)}
          loading={state.phase === "exchanges-loading"}
          disabled={busy}
          emptyState="No exchanges loaded"
        />
      </Field>

      {state.exchanges.length === 0 && state.phase === "idle" ? (
        <Button leadingIcon={<RefreshCw className="h-4 w-4" />} onClick={onRetryExchanges}>
          Reload Exchanges
        </Button>
      ) : (
        <Button
          leadingIcon={<RefreshCw className="h-4 w-4" />}
          onClick={onFetchSymbols}
          busy={state.phase === "symbols-loading"}
          disabled={busy || !state.selectedExchange}
        >
          Fetch Symbols
        </Button>
      )}

      {loadedMessage ? <Notice>{loadedMessage}</Notice> : null}

      {state.symbols.length > 0 ? (
        <Field
          label="Symbol"
          htmlFor={`${ids}-symbol`}
          help={state.symbolsExchange ? `Listed on ${state.symbolsExchange}` : undefined}
        >
          <Select
            id={`${ids}-symbol`}
            value={state.selectedSymbol}
            onChange={onSelectSymbol}
            options={toOptions(state.symbols)}
            disabled={busy}
          />
        </Field>
      ) : (
        <Notice>Select an exchange and fetch symbols to choose a trading pair.</Notice>
      )}

      <Field label="Username" htmlFor={`${ids}-username`}>
        <TextInput
          id={`${ids}-username`}
          value={widgets.username}
          onChange={(event) => set("username", event.target.value)}
        />
      </Field>

      <div className="grid grid-cols-2 gap-3">
        <Field label="RSI Period" htmlFor={`${ids}-rsi`}>
          <NumberInput
            id={`${ids}-rsi`}
            value={widgets.rsiPeriod}
            onChange={(value) => set("rsiPeriod", value)}
            bounds={PARAMETER_RANGES.rsi_period}
          />
        </Field>
        <Field label="MA Period" htmlFor={`${ids}-ma`}>
          <NumberInput
            id={`${ids}-ma`}
            value={widgets.maPeriod}
            onChange={(value) => set("maPeriod", value)}
            bounds={PARAMETER_RANGES.ma_period}
          />
        </Field>
        <Field label="Buy Threshold" htmlFor={`${ids}-buy`}>
          <NumberInput
            id={`${ids}-buy`}
            value={widgets.buyThreshold}
            onChange={(value) => set("buyThreshold", value)}
            bounds={PARAMETER_RANGES.buy_threshold}
          />
        </Field>
        <Field label="Sell Threshold" htmlFor={`${ids}-sell`}>
          <NumberInput
            id={`${ids}-sell`}
            value={widgets.sellThreshold}
            onChange={(value) => set("sellThreshold", value)}
            bounds={PARAMETER_RANGES.sell_threshold}
          />
        </Field>
      </div>

      <Field label="Trade Type" htmlFor={`${ids}-trade-type`}>
        <Select
          id={`${ids}-trade-type`}
          value={widgets.tradeType}
          onChange={(value) => set("tradeType", value)}
          options={tradeTypeOptions}
        />
      </Field>

      <Field
        label="Strategy"
        htmlFor={`${ids}-strategy`}
        help={STRATEGY_INFO[widgets.strategy].description}
      >
        <Select
          id={`${ids}-strategy`}
          value={widgets.strategy}
          onChange={(value) => set("strategy", value)}
          options={strategyOptions}
        />
      </Field>

      <Switch
        label="Use scratch RSI"
        help="Compute RSI locally instead of using the library indicator."
        checked={widgets.useScratchRsi}
        onChange={(checked) => set("useScratchRsi", checked)}
      />
      <Switch
        label="Use CSV data"
        help="Read candles from a local CSV file on the server."
        checked={widgets.useCsv}
        onChange={(checked) => set("useCsv", checked)}
      />

      <Button
        variant="primary"
        leadingIcon={<Play className="h-4 w-4" />}
        busy={state.phase === "backtest-running"}
        disabled={busy}
        onClick={onSubmit}
      >
        Run Backtest
      </Button>
    </Panel>
  );
}

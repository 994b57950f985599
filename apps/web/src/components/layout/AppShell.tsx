import { useMemo, useState } from "react";
import { BookOpen, CandlestickChart, Info } from "lucide-react";
import { NavLink, Outlet, useOutletContext } from "react-router-dom";
import type { ClientSettings } from "@repo/backtest-client";
import type { BacktestSession } from "@repo/backtest-session";
import { createBacktestSession, getClientSettings } from "../../lib/backtest-api";

export interface AppShellContextValue {
  session: BacktestSession;
  settings: ClientSettings;
}

function navClass({ isActive }: { isActive: boolean }) {
  return isActive
    ? "bg-cyan-400/20 text-cyan-100 border-cyan-300/30"
    : "bg-white/5 text-slate-300 border-white/10 hover:bg-white/10";
}

const links = [
  { to: "/", label: "Backtest", icon: CandlestickChart },
  { to: "/docs", label: "Documentation", icon: BookOpen },
  { to: "/about", label: "About", icon: Info },
] as const;

export function AppShell() {
  const [settings] = useState(getClientSettings);
  const [session] = useState(() => createBacktestSession(settings));

  const context = useMemo<AppShellContextValue>(
    () => ({ session, settings }),
    [session, settings],
  );

  return (
    <div className="min-h-screen px-4 py-8 sm:px-6 lg:px-10">
      <div className="mx-auto max-w-7xl space-y-6">
        <nav className="rounded-2xl border border-white/10 bg-slate-900/45 p-3">
          <div className="inline-flex flex-wrap items-center gap-2 rounded-xl bg-slate-950/40 p-1">
            {links.map(({ to, label, icon: Icon }) => (
              <NavLink
                key={to}
                to={to}
                end
                className={(state) =>
                  `inline-flex items-center gap-2 rounded-lg border px-4 py-2 text-sm transition ${navClass(state)}`
                }
              >
                <Icon className="h-4 w-4" />
                {label}
              </NavLink>
            ))}
          </div>
        </nav>

        <Outlet context={context} />
      </div>
    </div>
  );
}

export function useAppShellData() {
  return useOutletContext<AppShellContextValue>();
}

"use client";

import { useMemo, useState } from "react";
import {
  Area,
  Bar,
  CartesianGrid,
  ComposedChart,
  Legend,
  Line,
  LineChart,
  ReferenceLine,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from "recharts";
import type { ProjectionResult } from "@/engine/fxProjection";
import { formatRate, formatUsd } from "@/lib/format";

type ChartTab = "rates" | "costs" | "treasury";

const TABS: { value: ChartTab; label: string }[] = [
  { value: "rates", label: "Exchange rates" },
  { value: "costs", label: "Operating costs" },
  { value: "treasury", label: "Treasury" },
];

const CHART_HEIGHT = 320;
const CHART_MARGIN = { top: 10, right: 20, bottom: 10, left: 10 };
const AXIS_TICK = { fontSize: 11, fill: "var(--foreground)" };
const AXIS_LINE = { stroke: "var(--foreground)", strokeOpacity: 0.3 };
const TOOLTIP_STYLE = {
  backgroundColor: "var(--background)",
  border: "1px solid var(--foreground)",
  borderRadius: 8,
  color: "var(--foreground)",
};

function fmtK(v: number): string {
  return `${Math.round(v / 1000)}k`;
}

function RateChart({ title, data, marketKey, hedgeKey }: {
  title: string;
  data: Array<Record<string, number>>;
  marketKey: string;
  hedgeKey: string;
}) {
  return (
    <div className="flex-1 min-w-0">
      <h3 className="text-sm font-medium text-neutral-700 dark:text-neutral-300 mb-1">{title}</h3>
      <ResponsiveContainer width="100%" height={CHART_HEIGHT}>
        <LineChart data={data} margin={CHART_MARGIN}>
          <CartesianGrid strokeDasharray="3 3" stroke="currentColor" strokeOpacity={0.2} />
          <XAxis dataKey="month" tick={AXIS_TICK} axisLine={AXIS_LINE} tickLine={AXIS_LINE} />
          <YAxis domain={["auto", "auto"]} tickFormatter={(v) => formatRate(Number(v))} tick={AXIS_TICK} axisLine={AXIS_LINE} tickLine={AXIS_LINE} />
          <Tooltip contentStyle={TOOLTIP_STYLE} formatter={(v) => formatRate(Number(v), 4)} labelFormatter={(l) => `Month ${l}`} />
          <Legend />
          <Line type="monotone" dataKey={marketKey} name="Market" stroke="#dc2626" dot={false} />
          <Line type="monotone" dataKey={hedgeKey} name="Hedge" stroke="#16a34a" strokeDasharray="6 4" dot={false} />
        </LineChart>
      </ResponsiveContainer>
    </div>
  );
}

export function ProjectionCharts({ result }: { result: ProjectionResult }) {
  const [tab, setTab] = useState<ChartTab>("rates");

  const data = useMemo(
    () =>
      result.months.map((month, i) => ({
        month,
        usdPlnMarket: result.ratePaths.marketUsdPln[i] ?? 0,
        usdPlnHedge: result.ratePaths.hedgeUsdPln[i] ?? 0,
        eurUsdMarket: result.ratePaths.marketEurUsd[i] ?? 0,
        eurUsdHedge: result.ratePaths.hedgeEurUsd[i] ?? 0,
        costUnhedged: result.costs.unhedged[i] ?? 0,
        costHedged: result.costs.hedgedBlend[i] ?? 0,
        executionCost: result.costs.executionCost[i] ?? 0,
        treasuryUnhedged: result.treasury.unhedged[i] ?? 0,
        treasuryHedged: result.treasury.hedged[i] ?? 0,
      })),
    [result]
  );

  return (
    <section className="rounded-lg border border-neutral-200 dark:border-neutral-700 bg-[var(--background)] p-4">
      <div className="flex gap-2 mb-4">
        {TABS.map((t) => (
          <button
            key={t.value}
            type="button"
            onClick={() => setTab(t.value)}
            className={`px-3 py-1.5 rounded text-sm font-medium border ${
              tab === t.value
                ? "border-neutral-800 dark:border-neutral-200 bg-neutral-800 text-white dark:bg-neutral-200 dark:text-neutral-900"
                : "border-neutral-300 dark:border-neutral-600 hover:bg-neutral-100 dark:hover:bg-neutral-700"
            }`}
          >
            {t.label}
          </button>
        ))}
      </div>

      {tab === "rates" && (
        <div className="flex flex-col md:flex-row gap-4">
          <RateChart title="USD/PLN" data={data} marketKey="usdPlnMarket" hedgeKey="usdPlnHedge" />
          <RateChart title="EUR/USD" data={data} marketKey="eurUsdMarket" hedgeKey="eurUsdHedge" />
        </div>
      )}

      {tab === "costs" && (
        <ResponsiveContainer width="100%" height={CHART_HEIGHT}>
          <ComposedChart data={data} margin={CHART_MARGIN}>
            <CartesianGrid strokeDasharray="3 3" stroke="currentColor" strokeOpacity={0.2} />
            <XAxis dataKey="month" tick={AXIS_TICK} axisLine={AXIS_LINE} tickLine={AXIS_LINE} />
            <YAxis tickFormatter={(v) => fmtK(Number(v))} tick={AXIS_TICK} axisLine={AXIS_LINE} tickLine={AXIS_LINE} />
            <Tooltip contentStyle={TOOLTIP_STYLE} formatter={(v) => formatUsd(Number(v))} labelFormatter={(l) => `Month ${l}`} />
            <Legend />
            <Bar dataKey="costUnhedged" name="Unhedged" fill="#dc2626" fillOpacity={0.7} />
            <Bar dataKey="costHedged" name="Hedged" fill="#16a34a" fillOpacity={0.7} />
            <Line type="monotone" dataKey="executionCost" name="Hedging cost" stroke="#ea580c" strokeDasharray="2 3" dot={false} />
          </ComposedChart>
        </ResponsiveContainer>
      )}

      {tab === "treasury" && (
        <ResponsiveContainer width="100%" height={CHART_HEIGHT}>
          <ComposedChart data={data} margin={CHART_MARGIN}>
            <CartesianGrid strokeDasharray="3 3" stroke="currentColor" strokeOpacity={0.2} />
            <XAxis dataKey="month" tick={AXIS_TICK} axisLine={AXIS_LINE} tickLine={AXIS_LINE} />
            <YAxis tickFormatter={(v) => fmtK(Number(v))} tick={AXIS_TICK} axisLine={AXIS_LINE} tickLine={AXIS_LINE} />
            <Tooltip contentStyle={TOOLTIP_STYLE} formatter={(v) => formatUsd(Number(v), "USDT")} labelFormatter={(l) => `Month ${l}`} />
            <Legend />
            <ReferenceLine y={0} stroke="var(--foreground)" strokeDasharray="4 4" label="Zero" />
            <Area type="monotone" dataKey="treasuryUnhedged" name="Unhedged" stroke="#dc2626" fill="#dc2626" fillOpacity={0.15} />
            <Area type="monotone" dataKey="treasuryHedged" name="Hedged" stroke="#16a34a" fill="#16a34a" fillOpacity={0.15} />
          </ComposedChart>
        </ResponsiveContainer>
      )}
    </section>
  );
}

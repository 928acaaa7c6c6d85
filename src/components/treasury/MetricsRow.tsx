import { formatMonths, formatSignedMonths, formatUsd } from "@/lib/format";
import type { ProjectionMetrics } from "@/engine/fxProjection";

function Tile({ label, value, delta }: { label: string; value: string; delta?: { text: string; positive: boolean } }) {
  return (
    <div className="rounded-lg border border-neutral-200 dark:border-neutral-700 bg-[var(--background)] px-4 py-3">
      <div className="text-xs uppercase tracking-wide text-neutral-500 dark:text-neutral-400">{label}</div>
      <div className="text-xl font-semibold text-neutral-900 dark:text-neutral-100 mt-1">{value}</div>
      {delta && (
        <div className={`text-xs mt-1 ${delta.positive ? "text-green-700 dark:text-green-400" : "text-red-700 dark:text-red-400"}`}>
          {delta.text}
        </div>
      )}
    </div>
  );
}

export function MetricsRow({ treasury, metrics }: { treasury: number; metrics: ProjectionMetrics }) {
  return (
    <div className="grid grid-cols-2 md:grid-cols-4 gap-3">
      <Tile label="Treasury" value={formatUsd(treasury, "USDT")} />
      <Tile label="Runway (unhedged)" value={formatMonths(metrics.runwayUnhedged)} />
      <Tile
        label="Runway (hedged)"
        value={formatMonths(metrics.runwayHedged)}
        delta={{ text: formatSignedMonths(metrics.runwayDelta), positive: metrics.runwayDelta >= 0 }}
      />
      <Tile label="Savings from hedging" value={formatUsd(metrics.totalSavings)} />
    </div>
  );
}

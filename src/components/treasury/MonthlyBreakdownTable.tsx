import type { MonthlyRow } from "@/engine/fxProjection";
import { formatRate, formatUsd } from "@/lib/format";

const COLUMNS: { key: keyof MonthlyRow; label: string; format: (v: number) => string }[] = [
  { key: "month", label: "Month", format: String },
  { key: "usdPln", label: "USD/PLN", format: (v) => formatRate(v, 2) },
  { key: "eurUsd", label: "EUR/USD", format: (v) => formatRate(v, 2) },
  { key: "costUnhedged", label: "Cost unhedged", format: (v) => formatUsd(v) },
  { key: "costHedged", label: "Cost hedged", format: (v) => formatUsd(v) },
  { key: "executionCost", label: "Hedging cost", format: (v) => formatUsd(v) },
  { key: "treasuryUnhedged", label: "Treasury unhedged", format: (v) => formatUsd(v, "USDT") },
  { key: "treasuryHedged", label: "Treasury hedged", format: (v) => formatUsd(v, "USDT") },
];

export function MonthlyBreakdownTable({ rows }: { rows: MonthlyRow[] }) {
  return (
    <section className="space-y-3">
      <h2 className="text-base font-semibold text-neutral-800 dark:text-neutral-200 border-b border-neutral-200 dark:border-neutral-700 pb-1">
        Monthly breakdown
      </h2>
      <div className="rounded-lg border border-neutral-200 dark:border-neutral-700 bg-[var(--background)] overflow-x-auto">
        <table className="w-full border-collapse text-sm">
          <thead>
            <tr className="border-b border-neutral-200 dark:border-neutral-700 bg-neutral-50 dark:bg-neutral-800/50">
              {COLUMNS.map((c) => (
                <th key={c.key} className="text-right first:text-left py-2 px-3 font-medium text-neutral-600 dark:text-neutral-400">
                  {c.label}
                </th>
              ))}
            </tr>
          </thead>
          <tbody>
            {rows.map((row) => (
              <tr key={row.month} className="border-b border-neutral-100 dark:border-neutral-800">
                {COLUMNS.map((c) => (
                  <td
                    key={c.key}
                    className={`text-right first:text-left py-2 px-3 tabular-nums ${
                      row[c.key] < 0 ? "text-red-700 dark:text-red-400" : "text-neutral-800 dark:text-neutral-200"
                    }`}
                  >
                    {c.format(row[c.key])}
                  </td>
                ))}
              </tr>
            ))}
          </tbody>
        </table>
      </div>
    </section>
  );
}

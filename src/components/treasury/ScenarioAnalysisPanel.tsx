import type { ScenarioExpectedValue, ScenarioRow } from "@/engine/fxProjection";
import { formatMonths, formatPercent, formatRate, formatUsd } from "@/lib/format";

const TH = "text-left py-2 px-3 font-medium text-neutral-600 dark:text-neutral-400";
const TD = "py-2 px-3 text-neutral-800 dark:text-neutral-200";

export function ScenarioAnalysisPanel({
  rows,
  expectedValue,
}: {
  rows: ScenarioRow[];
  expectedValue: ScenarioExpectedValue;
}) {
  return (
    <section className="space-y-3">
      <h2 className="text-base font-semibold text-neutral-800 dark:text-neutral-200 border-b border-neutral-200 dark:border-neutral-700 pb-1">
        Scenario analysis
      </h2>
      <div className="rounded-lg border border-neutral-200 dark:border-neutral-700 bg-[var(--background)] overflow-x-auto">
        <table className="w-full border-collapse text-sm">
          <thead>
            <tr className="border-b border-neutral-200 dark:border-neutral-700 bg-neutral-50 dark:bg-neutral-800/50">
              <th className={TH}>Scenario</th>
              <th className={TH}>Prob.</th>
              <th className={TH}>USD/PLN</th>
              <th className={TH}>EUR/USD</th>
              <th className={TH}>Monthly cost</th>
              <th className={TH}>Total cost</th>
              <th className={TH}>Runway</th>
              <th className={TH}>Savings from hedge</th>
            </tr>
          </thead>
          <tbody>
            {rows.map((row) => (
              <tr key={row.scenarioId} className="border-b border-neutral-100 dark:border-neutral-800">
                <td className={`${TD} font-medium`}>{row.name}</td>
                <td className={TD}>{formatPercent(row.probability)}</td>
                <td className={TD}>{formatRate(row.usdPln, 2)}</td>
                <td className={TD}>{formatRate(row.eurUsd, 3)}</td>
                <td className={TD}>{formatUsd(row.monthlyCost)}</td>
                <td className={TD}>{formatUsd(row.totalCost)}</td>
                <td className={TD}>{formatMonths(row.runwayMonths)}</td>
                <td className={TD}>{formatUsd(row.savings)}</td>
              </tr>
            ))}
          </tbody>
        </table>
      </div>
      <div className="grid grid-cols-1 md:grid-cols-3 gap-3 text-sm">
        <div className="rounded-lg border border-neutral-200 dark:border-neutral-700 px-4 py-3">
          <div className="text-neutral-500 dark:text-neutral-400">Expected value (unhedged)</div>
          <div className="text-lg font-semibold">{formatUsd(expectedValue.evUnhedged)}</div>
        </div>
        <div className="rounded-lg border border-neutral-200 dark:border-neutral-700 px-4 py-3">
          <div className="text-neutral-500 dark:text-neutral-400">Cost with hedging</div>
          <div className="text-lg font-semibold">{formatUsd(expectedValue.evHedged)}</div>
        </div>
        <div className="rounded-lg border border-neutral-200 dark:border-neutral-700 px-4 py-3">
          <div className="text-neutral-500 dark:text-neutral-400">Expected savings</div>
          <div className="text-lg font-semibold">{formatUsd(expectedValue.evSavings)}</div>
        </div>
      </div>
    </section>
  );
}

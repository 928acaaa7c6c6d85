import type { HedgingRecommendation } from "@/engine/fxProjection";
import { formatUsd } from "@/lib/format";

export function RecommendationPanel({ recommendation }: { recommendation: HedgingRecommendation }) {
  const { profitable, grossSavings, totalHedgingCost, netSavings, runwayExtension } = recommendation;
  const tone = profitable
    ? "bg-green-100 dark:bg-green-900/30 border-green-200 dark:border-green-800 text-green-800 dark:text-green-200"
    : "bg-amber-100 dark:bg-amber-900/30 border-amber-200 dark:border-amber-800 text-amber-800 dark:text-amber-200";

  return (
    <section className="space-y-3">
      <h2 className="text-base font-semibold text-neutral-800 dark:text-neutral-200 border-b border-neutral-200 dark:border-neutral-700 pb-1">
        Recommendation
      </h2>
      <div className={`rounded-lg border px-4 py-3 text-sm ${tone}`}>
        <p className="font-semibold m-0 mb-2">
          {profitable ? "✅ Hedging pays off in this scenario" : "⚠️ Hedging may not pay off in this scenario"}
        </p>
        <ul className="list-disc pl-5 space-y-0.5 m-0">
          <li>
            {profitable ? "Gross savings" : "Cost difference"}: <strong>{formatUsd(grossSavings)}</strong>
          </li>
          <li>
            Hedging cost: <strong>{formatUsd(totalHedgingCost)}</strong>
          </li>
          <li>
            {profitable ? "Net savings" : "Balance"}: <strong>{formatUsd(netSavings)}</strong>
          </li>
          {profitable && (
            <li>
              Runway extension: <strong>{runwayExtension.toFixed(2)} months</strong>
            </li>
          )}
        </ul>
      </div>
    </section>
  );
}

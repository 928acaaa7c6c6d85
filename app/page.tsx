"use client";

import { useEffect, useMemo, useState } from "react";
import { DEFAULT_FX_SCENARIOS, DEFAULT_PROJECTION_PARAMS } from "@/config/treasuryDefaults";
import { DEBUG_PROJECTION } from "@/config/debug";
import { parseProjectionParams } from "@/domain/treasury/treasury.parse";
import { computeProjection } from "@/engine/fxProjection";
import { createLogger } from "@/lib/debug";
import { formToParams, paramsToForm, type ParamsFormField, type ParamsFormState } from "@/lib/paramsForm";
import { ParametersPanel } from "@/components/treasury/ParametersPanel";
import { MetricsRow } from "@/components/treasury/MetricsRow";
import { ProjectionCharts } from "@/components/treasury/ProjectionCharts";
import { ScenarioAnalysisPanel } from "@/components/treasury/ScenarioAnalysisPanel";
import { MonthlyBreakdownTable } from "@/components/treasury/MonthlyBreakdownTable";
import { RecommendationPanel } from "@/components/treasury/RecommendationPanel";

const log = createLogger("dashboard");

export default function DashboardPage() {
  const [form, setForm] = useState<ParamsFormState>(() => paramsToForm(DEFAULT_PROJECTION_PARAMS));

  const parsed = useMemo(() => parseProjectionParams(formToParams(form)), [form]);
  const result = useMemo(
    () => (parsed.ok ? computeProjection(parsed.params, DEFAULT_FX_SCENARIOS) : null),
    [parsed]
  );

  useEffect(() => {
    if (!parsed.ok) log.warn("invalid params", parsed.errors);
  }, [parsed]);

  const handleChange = (field: ParamsFormField, value: number) => {
    setForm((prev) => ({ ...prev, [field]: value }));
  };

  return (
    <main className="p-6 max-w-7xl mx-auto">
      <h1 className="text-2xl font-semibold m-0 mb-1">FX hedging strategy</h1>
      <p className="text-sm text-neutral-600 dark:text-neutral-400 mb-6">
        USDT treasury runway under EUR and PLN operating costs, unhedged vs. hedged at today&apos;s rates.
      </p>

      <div className="flex flex-col lg:flex-row gap-8">
        <ParametersPanel
          form={form}
          onChange={handleChange}
          onReset={() => setForm(paramsToForm(DEFAULT_PROJECTION_PARAMS))}
        />

        <div className="flex-1 min-w-0 space-y-8">
          {!parsed.ok && (
            <div className="rounded-lg border border-red-200 dark:border-red-800 bg-red-100 dark:bg-red-900/30 px-4 py-3 text-sm text-red-800 dark:text-red-200">
              <p className="font-semibold m-0 mb-1">Invalid parameters</p>
              <ul className="list-disc pl-5 m-0">
                {parsed.errors.map((err) => (
                  <li key={err}>{err}</li>
                ))}
              </ul>
            </div>
          )}

          {parsed.ok && result && (
            <>
              <MetricsRow treasury={parsed.params.treasury} metrics={result.metrics} />
              <ProjectionCharts result={result} />
              <ScenarioAnalysisPanel rows={result.scenarios.rows} expectedValue={result.scenarios.expectedValue} />
              <MonthlyBreakdownTable rows={result.monthlyRows} />
              <RecommendationPanel recommendation={result.recommendation} />
              {DEBUG_PROJECTION && (
                <pre className="p-3 text-xs overflow-x-auto whitespace-pre-wrap break-words rounded-lg border border-neutral-200 dark:border-neutral-700">
                  {JSON.stringify(result, null, 2)}
                </pre>
              )}
            </>
          )}
        </div>
      </div>
    </main>
  );
}

"use client";

import { PARAM_INPUT_BOUNDS, type NumericInputBounds } from "@/config/treasuryDefaults";
import { parseNumericInput, type ParamsFormField, type ParamsFormState } from "@/lib/paramsForm";

type FieldDef = {
  field: ParamsFormField;
  label: string;
  bounds: NumericInputBounds;
  /** Render as a range slider instead of a number box. */
  slider?: boolean;
  suffix?: string;
};

const SECTIONS: { title: string; fields: FieldDef[] }[] = [
  {
    title: "Treasury",
    fields: [
      { field: "treasury", label: "Treasury (USDT)", bounds: PARAM_INPUT_BOUNDS.treasury },
      { field: "eurCosts", label: "Monthly EUR costs", bounds: PARAM_INPUT_BOUNDS.eurCosts },
      { field: "plnCosts", label: "Monthly PLN costs", bounds: PARAM_INPUT_BOUNDS.plnCosts },
      { field: "horizonMonths", label: "Forecast horizon (months)", bounds: PARAM_INPUT_BOUNDS.horizonMonths, slider: true },
    ],
  },
  {
    title: "Exchange rates",
    fields: [
      { field: "usdPlnStart", label: "USD/PLN (start)", bounds: PARAM_INPUT_BOUNDS.usdPln },
      { field: "eurUsdStart", label: "EUR/USD (start)", bounds: PARAM_INPUT_BOUNDS.eurUsd },
      { field: "usdPlnEnd", label: "USD/PLN (end, forecast)", bounds: PARAM_INPUT_BOUNDS.usdPln },
      { field: "eurUsdEnd", label: "EUR/USD (end, forecast)", bounds: PARAM_INPUT_BOUNDS.eurUsd },
    ],
  },
  {
    title: "Hedging",
    fields: [
      { field: "hedgeCoveragePct", label: "Hedge coverage", bounds: PARAM_INPUT_BOUNDS.hedgeCoveragePct, slider: true, suffix: "%" },
      { field: "otcSpreadPct", label: "OTC spread", bounds: PARAM_INPUT_BOUNDS.otcSpreadPct, slider: true, suffix: "%" },
      { field: "bankSpreadPct", label: "Bank EUR/PLN spread", bounds: PARAM_INPUT_BOUNDS.bankSpreadPct, slider: true, suffix: "%" },
    ],
  },
];

export function ParametersPanel({
  form,
  onChange,
  onReset,
}: {
  form: ParamsFormState;
  onChange: (field: ParamsFormField, value: number) => void;
  onReset: () => void;
}) {
  return (
    <aside className="w-full lg:w-72 shrink-0 space-y-6">
      {SECTIONS.map((section) => (
        <section key={section.title}>
          <h2 className="text-sm font-semibold text-neutral-800 dark:text-neutral-200 mb-2 border-b border-neutral-200 dark:border-neutral-700 pb-1">
            {section.title}
          </h2>
          <div className="space-y-3">
            {section.fields.map(({ field, label, bounds, slider, suffix }) => {
              const value = form[field];
              return (
                <label key={field} className="block text-sm">
                  <span className="flex justify-between text-neutral-600 dark:text-neutral-400 mb-1">
                    {label}
                    {slider && (
                      <span className="font-medium text-neutral-800 dark:text-neutral-200">
                        {Number.isFinite(value) ? value : "—"}
                        {suffix}
                      </span>
                    )}
                  </span>
                  <input
                    type={slider ? "range" : "number"}
                    min={bounds.min}
                    max={bounds.max}
                    step={bounds.step}
                    value={Number.isFinite(value) ? value : ""}
                    onChange={(e) => onChange(field, parseNumericInput(e.target.value))}
                    className={
                      slider
                        ? "w-full accent-neutral-700 dark:accent-neutral-300"
                        : "w-full px-2 py-1 rounded border border-neutral-300 dark:border-neutral-600 bg-[var(--background)]"
                    }
                  />
                </label>
              );
            })}
          </div>
        </section>
      ))}
      <button
        type="button"
        onClick={onReset}
        className="px-3 py-1.5 rounded border border-neutral-300 dark:border-neutral-600 bg-[var(--background)] hover:bg-neutral-100 dark:hover:bg-neutral-700 text-sm font-medium"
      >
        Reset to defaults
      </button>
    </aside>
  );
}

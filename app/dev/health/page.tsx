"use client";

import { useCallback, useEffect, useState } from "react";
import { runAllChecks, type CheckGroup, type CheckStatus, type RunResult } from "@/dev/healthChecks";

const isDev = process.env.NODE_ENV === "development";

const GROUPS: CheckGroup[] = ["Rate Paths", "Cost Blend", "Cumulative & Treasury", "Runway", "Scenarios", "Edge Inputs"];

const STATUS_STYLE: Record<CheckStatus, { icon: string; label: string; banner: string }> = {
  pass: {
    icon: "✅",
    label: "All invariants hold",
    banner: "bg-green-100 dark:bg-green-900/30 border-green-200 dark:border-green-800 text-green-800 dark:text-green-200",
  },
  warn: {
    icon: "⚠️",
    label: "Invariants hold; inputs need attention",
    banner: "bg-amber-100 dark:bg-amber-900/30 border-amber-200 dark:border-amber-800 text-amber-800 dark:text-amber-200",
  },
  fail: {
    icon: "❌",
    label: "Engine invariant broken",
    banner: "bg-red-100 dark:bg-red-900/30 border-red-200 dark:border-red-800 text-red-800 dark:text-red-200",
  },
};

function overallStatus(results: RunResult["results"]): CheckStatus {
  if (results.some((r) => r.status === "fail")) return "fail";
  if (results.some((r) => r.status === "warn")) return "warn";
  return "pass";
}

export default function DevHealthPage() {
  const [run, setRun] = useState<RunResult | null>(null);

  const rerun = useCallback(() => {
    if (isDev) setRun(runAllChecks());
  }, []);

  useEffect(() => {
    rerun();
  }, [rerun]);

  if (!isDev) {
    return (
      <main className="p-6 max-w-2xl">
        <h1 className="text-xl font-semibold m-0 mb-4">Engine Health</h1>
        <p className="text-neutral-600 dark:text-neutral-400">Dev tools disabled.</p>
      </main>
    );
  }

  if (run === null) {
    return <main className="p-6 text-neutral-500 dark:text-neutral-400">Running checks…</main>;
  }

  const overall = STATUS_STYLE[overallStatus(run.results)];
  const count = (status: CheckStatus) => run.results.filter((r) => r.status === status).length;

  return (
    <main className="p-6 max-w-5xl">
      <div className="flex items-baseline justify-between mb-2">
        <h1 className="text-2xl font-semibold m-0">Engine Health</h1>
        <button
          type="button"
          onClick={rerun}
          className="px-3 py-1.5 rounded border border-neutral-300 dark:border-neutral-600 hover:bg-neutral-100 dark:hover:bg-neutral-700 text-sm font-medium"
        >
          Re-run
        </button>
      </div>
      <p className="text-sm text-neutral-600 dark:text-neutral-400 mb-6">
        Projection invariants over the fixture parameter sets, plus a weight check on the default FX scenarios.
      </p>

      <div className={`rounded-lg border px-4 py-3 mb-6 flex flex-wrap gap-4 ${overall.banner}`}>
        <strong>
          {overall.icon} {overall.label}
        </strong>
        <span className="text-sm">
          {count("pass")} passed · {count("warn")} warned · {count("fail")} failed · {run.durationMs.toFixed(1)} ms
        </span>
      </div>

      {GROUPS.map((group) => {
        const rows = run.results.filter((r) => r.group === group);
        if (rows.length === 0) return null;
        return (
          <section key={group} className="mb-6">
            <h2 className="text-base font-semibold mb-2 border-b border-neutral-200 dark:border-neutral-700 pb-1">{group}</h2>
            <ul className="space-y-1 text-sm">
              {rows.map((row) => (
                <li key={row.name} className="flex gap-2">
                  <span aria-hidden>{STATUS_STYLE[row.status].icon}</span>
                  <div className="min-w-0">
                    <span className="font-medium">{row.name}</span>
                    <span className="text-neutral-600 dark:text-neutral-400"> — {row.message}</span>
                    {row.details !== undefined && (
                      <details className="mt-1">
                        <summary className="cursor-pointer text-xs text-neutral-500">details</summary>
                        <pre className="p-2 text-xs overflow-x-auto whitespace-pre-wrap break-words bg-neutral-50 dark:bg-neutral-800/50 rounded">
                          {JSON.stringify(row.details, null, 2)}
                        </pre>
                      </details>
                    )}
                  </div>
                </li>
              ))}
            </ul>
          </section>
        );
      })}
    </main>
  );
}

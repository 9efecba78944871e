// /src/lib/safety/diagnostics.ts

import type { Diagnostic, DiagnosticSeverity, DiagnosticSink, LogLevel } from "../../contracts";

const SEVERITY_RANK: Readonly<Record<DiagnosticSeverity, number>> = {
  debug: 0,
  info: 1,
  warning: 2,
  "user-warning": 3,
  error: 4,
};

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warning: 2,
  error: 4,
  silent: Number.POSITIVE_INFINITY,
};

export function isAtLeast(severity: DiagnosticSeverity, level: LogLevel): boolean {
  return SEVERITY_RANK[severity] >= LEVEL_RANK[level];
}

/**
 * Console transport. Prints `[POLICY-ENGINE] CODE message` with the context as a structured tail.
 */
export function createConsoleSink(level: LogLevel = "warning"): DiagnosticSink {
  return (d) => {
    if (!isAtLeast(d.severity, level)) return;

    const line = `[POLICY-ENGINE] ${d.code} ${d.message}`;
    const meta = { context: d.context, ...(d.year !== undefined ? { year: d.year } : {}) };

    switch (d.severity) {
      case "debug":
      case "info":
        console.log(line, meta);
        return;
      case "warning":
      case "user-warning":
        console.warn(line, meta);
        return;
      case "error":
        console.error(line, meta);
        return;
      default: {
        const _exhaustive: never = d.severity;
        return _exhaustive;
      }
    }
  };
}

export const silentSink: DiagnosticSink = () => undefined;

/** Forward every diagnostic to each sink in order. */
export function teeSinks(...sinks: DiagnosticSink[]): DiagnosticSink {
  return (d) => {
    for (const sink of sinks) sink(d);
  };
}

/**
 * Keeps diagnostics in arrival order. Used by the orchestrator to attach a year's
 * diagnostics to its outcome, and by callers that surface warnings beside figures.
 */
export class DiagnosticCollector {
  private readonly items: Diagnostic[] = [];

  readonly sink: DiagnosticSink = (d) => {
    this.items.push(d);
  };

  get diagnostics(): ReadonlyArray<Diagnostic> {
    return this.items.slice();
  }

  /** Diagnostics that must reach end users. */
  userWarnings(): Diagnostic[] {
    return this.items.filter((d) => d.severity === "user-warning");
  }

  hasCode(code: Diagnostic["code"]): boolean {
    return this.items.some((d) => d.code === code);
  }
}

// /src/lib/safety/diagnostics.test.ts
import { afterEach, describe, it, expect, vi } from "vitest";

import type { Diagnostic } from "../../contracts";
import { DiagnosticCollector, createConsoleSink, isAtLeast, silentSink, teeSinks } from "./diagnostics";

const floor: Diagnostic = {
  severity: "warning",
  code: "GDP_FLOOR_APPLIED",
  message: "GDP 0.000 (year 2030) is below minimum 1.",
  context: "gdp",
  year: 2030,
};

const info: Diagnostic = {
  severity: "info",
  code: "GDP_GROWTH_ADJUSTED",
  message: "GDP growth adjusted",
  context: "gdp growth",
};

describe("createConsoleSink", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints warnings with the engine tag and a structured tail", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    createConsoleSink("warning")(floor);
    expect(warn).toHaveBeenCalledWith("[POLICY-ENGINE] GDP_FLOOR_APPLIED GDP 0.000 (year 2030) is below minimum 1.", {
      context: "gdp",
      year: 2030,
    });
  });

  it("drops diagnostics below the level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    createConsoleSink("warning")(info);
    expect(log).not.toHaveBeenCalled();

    createConsoleSink("debug")(info);
    expect(log).toHaveBeenCalledWith("[POLICY-ENGINE] GDP_GROWTH_ADJUSTED GDP growth adjusted", {
      context: "gdp growth",
    });
  });

  it("routes errors to console.error and prints nothing when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const bad: Diagnostic = { ...floor, severity: "error", code: "PERCENTAGE_OUT_OF_RANGE" };

    createConsoleSink("silent")(bad);
    expect(error).not.toHaveBeenCalled();

    createConsoleSink("error")(bad);
    expect(error).toHaveBeenCalledTimes(1);
  });
});

describe("severity ranking", () => {
  it("ranks user warnings between warnings and errors", () => {
    expect(isAtLeast("user-warning", "warning")).toBe(true);
    expect(isAtLeast("user-warning", "error")).toBe(false);
    expect(isAtLeast("error", "silent")).toBe(false);
  });
});

describe("DiagnosticCollector / teeSinks", () => {
  it("collects in order and forwards to every sink", () => {
    const a = new DiagnosticCollector();
    const b = new DiagnosticCollector();
    const sink = teeSinks(a.sink, silentSink, b.sink);

    sink(floor);
    sink({ ...info, severity: "user-warning" });

    expect(a.diagnostics.map((d) => d.code)).toEqual(["GDP_FLOOR_APPLIED", "GDP_GROWTH_ADJUSTED"]);
    expect(b.userWarnings()).toHaveLength(1);
    expect(a.hasCode("EXTREME_DEBT")).toBe(false);
  });
});

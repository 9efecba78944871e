// /src/lib/mechanics/ramp.ts
// Phase-in curves: elapsed years since a policy's start -> completion fraction in [0, 1].

import type { RampCurve } from "../../contracts";

export function clampUnit(x: number): number {
  if (Number.isNaN(x) || x < 0) return 0;
  return x > 1 ? 1 : x;
}

/** min(t / r, 1); a zero (or negative) ramp is fully phased in. Years before the start give 0. */
export function linearProgress(yearsSinceStart: number, rampYears: number): number {
  if (!(rampYears > 0)) return 1;
  return clampUnit(yearsSinceStart / rampYears);
}

/**
 * Logistic curve over x = 12 * t / r - 6, i.e. the domain [-6, 6] across the ramp:
 * ~0.0025 at the start, 0.5 at the midpoint, ~0.9975 at r.
 */
export function sigmoidProgress(yearsSinceStart: number, rampYears: number): number {
  if (!(rampYears > 0)) return 1;
  const x = (yearsSinceStart / rampYears) * 12 - 6;
  return clampUnit(1 / (1 + Math.exp(-x)));
}

export function rampProgress(curve: RampCurve, yearsSinceStart: number, rampYears: number): number {
  switch (curve) {
    case "linear":
      return linearProgress(yearsSinceStart, rampYears);
    case "sigmoid":
      return sigmoidProgress(yearsSinceStart, rampYears);
    default: {
      const _exhaustive: never = curve;
      return _exhaustive;
    }
  }
}

// /src/lib/mechanics/circuitBreakers.ts
// Per-year threshold checks. No memory of earlier years: a breaker that fired last year
// is evaluated from scratch this year.

import type {
  CircuitBreakerCheck,
  CircuitBreakerHit,
  CircuitBreakerRule,
  CircuitBreakerTriggerType,
} from "../../contracts";

type Rules = ReadonlyArray<CircuitBreakerRule> | null | undefined;

const NOT_TRIGGERED: CircuitBreakerCheck = Object.freeze({ triggered: false, message: null });

/** Thresholds print with at least one decimal: 18 -> "18.0", 18.25 -> "18.25". */
function formatThreshold(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

/** First rule of `type`, in declaration order, whose threshold the metric strictly exceeds. */
function firstBreach(metric: number, rules: Rules, type: CircuitBreakerTriggerType): CircuitBreakerRule | undefined {
  return rules?.find((rule) => rule.trigger_type === type && metric > rule.threshold_value);
}

/** `spendingPctGdp` is a percentage (19 = 19% of GDP). */
export function checkSpendingCap(spendingPctGdp: number, rules: Rules): CircuitBreakerCheck {
  const rule = firstBreach(spendingPctGdp, rules, "spending_cap");
  if (!rule) return NOT_TRIGGERED;

  return {
    triggered: true,
    message: `Spending ${spendingPctGdp.toFixed(1)}% GDP exceeds ${formatThreshold(rule.threshold_value)}% cap - ${rule.action}`,
  };
}

export function checkSurplusTrigger(surplusPctGdp: number, rules: Rules): CircuitBreakerCheck {
  const rule = firstBreach(surplusPctGdp, rules, "surplus_trigger");
  if (!rule) return NOT_TRIGGERED;

  return {
    triggered: true,
    message: `Surplus ${surplusPctGdp.toFixed(1)}% GDP exceeds ${formatThreshold(rule.threshold_value)}% - ${rule.action}`,
  };
}

/** Spending cap first, then surplus trigger; at most one hit each. */
export function evaluateCircuitBreakers(
  spendingPctGdp: number,
  surplusPctGdp: number,
  rules: Rules,
): CircuitBreakerHit[] {
  const hits: CircuitBreakerHit[] = [];

  const cap = checkSpendingCap(spendingPctGdp, rules);
  if (cap.triggered && cap.message !== null) hits.push(["spending_cap", cap.message]);

  const trigger = checkSurplusTrigger(surplusPctGdp, rules);
  if (trigger.triggered && trigger.message !== null) hits.push(["surplus_trigger", trigger.message]);

  return hits;
}

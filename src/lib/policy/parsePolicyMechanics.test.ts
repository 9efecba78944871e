// /src/lib/policy/parsePolicyMechanics.test.ts
import { describe, it, expect } from "vitest";

import { PolicyMechanicsParseError, toClientError } from "../errors";
import { parsePolicyMechanics, safeParsePolicyMechanics } from "./parsePolicyMechanics";

describe("parsePolicyMechanics", () => {
  it("fills defaults for an empty object", () => {
    const m = parsePolicyMechanics({});
    expect(m.policy_name).toBe("Uploaded Policy");
    expect(m.policy_type).toBe("healthcare");
    expect(m.funding_mechanisms).toEqual([]);
    expect(m.target_spending_pct_gdp).toBeNull();
    expect(m.target_spending_year).toBeNull();
    expect(m.surplus_allocation).toBeNull();
    expect(m.circuit_breakers).toEqual([]);
  });

  it("returns a frozen value", () => {
    const m = parsePolicyMechanics({ funding_mechanisms: [{ source_type: "payroll_tax", percentage_rate: 15 }] });
    expect(Object.isFrozen(m)).toBe(true);
    expect(Object.isFrozen(m.funding_mechanisms)).toBe(true);
    expect(Object.isFrozen(m.funding_mechanisms[0])).toBe(true);
  });

  it("folds unrecognized source kinds into labelled other mechanisms", () => {
    const m = parsePolicyMechanics({
      funding_mechanisms: [
        { source_type: "transaction_tax", percentage_gdp: 1.5, description: "0.1% on trades", ramp_years: 3 },
        { source_type: "import_tariffs", label: "tariffs", percentage_gdp: 0.5 },
      ],
    });
    expect(m.funding_mechanisms).toEqual([
      { source_type: "other", label: "transaction_tax", percentage_gdp: 1.5, description: "0.1% on trades" },
      { source_type: "other", label: "tariffs", percentage_gdp: 0.5 },
    ]);
  });

  it("treats a missing percentage as zero", () => {
    const m = parsePolicyMechanics({ funding_mechanisms: [{ source_type: "redirected_federal" }] });
    expect(m.funding_mechanisms).toEqual([{ source_type: "redirected_federal", percentage_gdp: 0 }]);
  });

  it("keeps other allocations in declaration order", () => {
    const m = parsePolicyMechanics({
      surplus_allocation: { debt_reduction_pct: 50, other_allocations: { research: 5, housing: 2 } },
    });
    expect([...(m.surplus_allocation?.other_allocations.keys() ?? [])]).toEqual(["research", "housing"]);
    expect(m.surplus_allocation?.contingency_reserve_pct).toBe(0);
  });

  it("rejects negative ramps and out-of-range percentages with every issue listed", () => {
    let caught: unknown;
    try {
      parsePolicyMechanics({
        funding_mechanisms: [
          { source_type: "converted_premiums", percentage_gdp: 5, ramp_years: -2 },
          { source_type: "payroll_tax", percentage_rate: 150 },
        ],
      });
    } catch (e) {
      caught = e;
    }

    expect(caught).toBeInstanceOf(PolicyMechanicsParseError);
    if (!(caught instanceof PolicyMechanicsParseError)) return;
    expect(caught.issues).toHaveLength(2);
    expect(caught.issues[0]).toMatch(/^funding_mechanisms\.0\.ramp_years: /);
    expect(caught.issues[1]).toMatch(/^funding_mechanisms\.1\.percentage_rate: /);

    const client = toClientError(caught);
    expect(client.error).toBe("INVALID_POLICY");
    expect(client.issues).toEqual(caught.issues);
  });

  it("rejects reserved allocation names", () => {
    const result = safeParsePolicyMechanics({ surplus_allocation: { other_allocations: { unallocated: 10 } } });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.issues).toEqual([
      'surplus_allocation.other_allocations.unallocated: "unallocated" is reserved for a standard allocation bucket.',
    ]);
  });

  it("rejects unknown fields on known mechanisms", () => {
    const result = safeParsePolicyMechanics({
      funding_mechanisms: [{ source_type: "payroll_tax", percentage_rate: 10, rate_cap: 5 }],
    });
    expect(result.ok).toBe(false);
  });

  it("rejects non-object input", () => {
    expect(() => parsePolicyMechanics("policy")).toThrow(PolicyMechanicsParseError);
  });
});

import { describe, expect, it } from "vitest";
import type { Signal, SignalMap } from "../block.js";
import { MalformedDocumentError, UnresolvedReferenceError } from "../errors.js";
import { compositeName, createElementary, defaultCatalog, elementaryName } from "./catalog.js";

/** Steps one block through `inputs`, committing after each, and collects output `y`. */
function run(type: string, params: Record<string, Signal>, inputs: SignalMap[], dt = 1): Signal[] {
  const b = createElementary(type, params);
  return inputs.map((inp, step) => {
    const out = b.evaluate(inp, { time: step * dt, dt, step });
    b.commit();
    const y = out["y"];
    if (y === undefined) throw new Error(`${type} produced no y`);
    return y;
  });
}

describe("type names", () => {
  it("normalizes CDL-qualified elementary names", () => {
    expect(elementaryName("Buildings.Controls.OBC.CDL.Reals.Add")).toEqual({ name: "Reals.Add", qualified: true });
    expect(elementaryName("cdl:CDL.Logical.Not")).toEqual({ name: "Logical.Not", qualified: true });
    expect(elementaryName("Reals.Add")).toEqual({ name: "Reals.Add", qualified: false });
  });

  it("reduces composite references to their last segment", () => {
    expect(compositeName("ex:SubController")).toBe("SubController");
    expect(compositeName("http://example.org/lib#Pkg.SubController")).toBe("SubController");
    expect(compositeName("Plain")).toBe("Plain");
  });
});

describe("BlockCatalog", () => {
  it("leaves unqualified unknown names to composite resolution", () => {
    expect(defaultCatalog.lookup("SubController")).toBeUndefined();
    expect(() => defaultCatalog.lookup("CDL.Reals.Nope")).toThrow(UnresolvedReferenceError);
  });

  it("refuses bad parameters when creating a block", () => {
    expect(() => createElementary("Reals.Sources.Ramp", { duration: -1 })).toThrow(MalformedDocumentError);
    expect(() => createElementary("Reals.Abs", { k: 1 })).toThrow(MalformedDocumentError);
  });
});

describe("catalogue blocks", () => {
  it("computes real arithmetic", () => {
    expect(run("Reals.Add", { k1: 2, k2: -1 }, [{ u1: 3, u2: 4 }])).toEqual([2]);
    expect(run("Reals.Subtract", {}, [{ u1: 3, u2: 4 }])).toEqual([-1]);
    expect(run("Reals.Multiply", {}, [{ u1: 3, u2: 4 }])).toEqual([12]);
    expect(run("Reals.Divide", {}, [{ u1: 3, u2: 4 }])).toEqual([0.75]);
    expect(run("Reals.AddParameter", { p: 0.5 }, [{ u: 1 }])).toEqual([1.5]);
    expect(run("Reals.Abs", {}, [{ u: -2 }])).toEqual([2]);
    expect(run("Reals.Min", {}, [{ u1: 1, u2: -1 }])).toEqual([-1]);
    expect(run("Reals.Max", {}, [{ u1: 1, u2: -1 }])).toEqual([1]);
    expect(run("Reals.Limiter", { uMax: 1, uMin: -1 }, [{ u: 5 }, { u: -5 }, { u: 0.5 }])).toEqual([1, -1, 0.5]);
  });

  it("raises domain errors", () => {
    expect(() => run("Reals.Divide", {}, [{ u1: 1, u2: 0 }])).toThrow("division by zero");
    expect(() => run("Reals.Sqrt", {}, [{ u: -4 }])).toThrow("square root of negative value -4");
    expect(() => run("Reals.Abs", {}, [{ u: true }])).toThrow("input 'u' is not numeric (true)");
  });

  it("switches a hysteresis on above uHigh and off below uLow", () => {
    const us = [0, 2.5, 1.5, 0.5, 1.5].map((u) => ({ u }));
    expect(run("Reals.Hysteresis", { uLow: 1, uHigh: 2 }, us)).toEqual([false, true, true, false, false]);
  });

  it("ramps between startTime and startTime + duration", () => {
    const ys = run("Reals.Sources.Ramp", { height: 4, duration: 2, offset: 1, startTime: 1 }, [{}, {}, {}, {}]);
    expect(ys).toEqual([1, 1, 3, 5]);
  });

  it("delays by one step", () => {
    expect(run("Discrete.UnitDelay", { y_start: 7 }, [{ u: 1 }, { u: 2 }, { u: 3 }])).toEqual([7, 1, 2]);
    expect(run("Logical.Pre", { pre_u_start: true }, [{ u: false }, { u: true }])).toEqual([true, false]);
  });

  it("detects rising edges", () => {
    const us = [false, true, true, false, true].map((u) => ({ u }));
    expect(run("Logical.Edge", {}, us)).toEqual([false, true, false, false, true]);
  });

  it("evaluates logic and conversions", () => {
    expect(run("Logical.And", {}, [{ u1: true, u2: false }])).toEqual([false]);
    expect(run("Logical.Or", {}, [{ u1: true, u2: false }])).toEqual([true]);
    expect(run("Logical.Not", {}, [{ u: true }])).toEqual([false]);
    expect(run("Conversions.BooleanToReal", { realTrue: 5 }, [{ u: true }, { u: false }])).toEqual([5, 0]);
    expect(run("Conversions.RealToInteger", {}, [{ u: 2.6 }])).toEqual([3]);
    expect(run("Integers.Add", {}, [{ u1: 2, u2: 3 }])).toEqual([5]);
    expect(run("Integers.Sources.Constant", { k: 4 }, [{}])).toEqual([4]);
    expect(run("Reals.Sources.Constant", { k: 1.5 }, [{}])).toEqual([1.5]);
  });

  it("integrates k*u*dt", () => {
    expect(run("Reals.IntegratorWithReset", { k: 2, y_start: 1 }, [{ u: 1, trigger: false }, { u: 1, trigger: false }, { u: 0, trigger: false }], 0.5)).toEqual([1, 2, 3]);
  });
});

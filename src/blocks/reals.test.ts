import { describe, expect, it } from "vitest";
import { column, drive, frames, type Frame } from "../test_support.js";

const once = (inputs: Record<string, number | boolean>) => frames(1, [inputs]);
const values = (us: number[]) => us.map((u) => ({ u }));
const at = (times: number[]) => times.map((t): Frame => [t, {}]);

describe("Reals functions", () => {
  it("evaluates elementary functions", () => {
    expect(column(drive("Reals.Log", {}, once({ u: 1 })))).toEqual([0]);
    expect(column(drive("Reals.Exp", {}, once({ u: 0 })))).toEqual([1]);
    expect(column(drive("Reals.Log10", {}, once({ u: 100 })))).toEqual([2]);
    expect(column(drive("Reals.Average", {}, once({ u1: 1, u2: 2 })))).toEqual([1.5]);
    const [angle] = column(drive("Reals.Atan2", {}, once({ u1: 1, u2: 1 })));
    expect(angle).toBeCloseTo(Math.PI / 4);
  });

  it("rejects arguments outside the domain", () => {
    expect(() => drive("Reals.Asin", {}, once({ u: 2 }))).toThrow("asin is undefined for 2");
    expect(() => drive("Reals.Log", {}, once({ u: 0 }))).toThrow("log is undefined for 0");
    expect(() => drive("Reals.Modulo", {}, once({ u1: 1, u2: 0 }))).toThrow("modulo by zero");
  });

  it("takes the modulo with the sign of the divisor", () => {
    expect(column(drive("Reals.Modulo", {}, frames(1, [{ u1: 7, u2: 3 }, { u1: -7, u2: 3 }])))).toEqual([1, 2]);
  });

  it("rounds halves away from zero", () => {
    expect(column(drive("Reals.Round", { n: 1 }, frames(1, values([1.25, -1.25]))))).toEqual([1.3, -1.3]);
    expect(column(drive("Reals.Round", {}, frames(1, values([2.5, -2.5]))))).toEqual([3, -3]);
  });

  it("interpolates along a line, limited to [x1, x2] by default", () => {
    const line = { x1: 0, f1: 0, x2: 10, f2: 100 };
    const inputs = [5, 20, -5].map((u) => ({ ...line, u }));
    expect(column(drive("Reals.Line", {}, frames(1, inputs)))).toEqual([50, 100, 0]);
    expect(column(drive("Reals.Line", { limitAbove: false }, frames(1, [{ ...line, u: 20 }])))).toEqual([200]);
  });

  it("switches and combines nin inputs", () => {
    expect(column(drive("Reals.Switch", {}, once({ u1: 1, u2: false, u3: 3 })))).toEqual([3]);
    const us = { u1: 1, u2: 3, u3: 2 };
    expect(column(drive("Reals.MultiSum", { nin: 3 }, once(us)))).toEqual([6]);
    expect(column(drive("Reals.MultiMax", { nin: 3 }, once(us)))).toEqual([3]);
    expect(column(drive("Reals.MultiMin", { nin: 3 }, once(us)))).toEqual([1]);
  });
});

describe("Reals comparisons with hysteresis", () => {
  it("holds Greater true until u1 drops below u2 - h", () => {
    const inputs = [2, 0.5, -0.5, 0.5].map((u1) => ({ u1, u2: 1 }));
    expect(column(drive("Reals.Greater", { h: 1 }, frames(1, inputs)))).toEqual([true, true, false, false]);
  });

  it("holds LessThreshold true until u reaches t + h", () => {
    expect(column(drive("Reals.LessThreshold", { t: 2, h: 1 }, frames(1, values([3, 1, 2.5, 3.5, 2.5]))))).toEqual([
      false,
      true,
      true,
      false,
      false,
    ]);
  });
});

describe("Reals dynamics", () => {
  it("differentiates against the previous sample", () => {
    expect(column(drive("Reals.Derivative", {}, frames(0.5, values([1, 2, 2, 0]))))).toEqual([0, 2, 0, -4]);
    expect(column(drive("Reals.Derivative", { y_max: 3 }, frames(0.5, values([1, 2, 2, 0]))))).toEqual([0, 2, 0, -3]);
  });

  it("limits the slew rate in each direction", () => {
    const out = drive("Reals.LimitSlewRate", { raisingSlewRate: 2, fallingSlewRate: 1 }, frames(0.5, values([10, 10, -10, -10])));
    expect(column(out)).toEqual([1, 2, 1.5, 1]);
  });

  it("averages over a sliding window of delta seconds", () => {
    expect(column(drive("Reals.MovingAverage", { delta: 1 }, frames(0.5, values([2, 4, 6, 8]))))).toEqual([2, 3, 4, 6]);
  });
});

describe("Reals sources", () => {
  it("pulses between offset and offset + amplitude", () => {
    const out = drive("Reals.Sources.Pulse", { amplitude: 2, width: 0.5, period: 2, offset: 1 }, at([0, 0.5, 1, 2]));
    expect(column(out)).toEqual([3, 3, 1, 3]);
  });

  it("starts the sine at startTime", () => {
    const ys = column(drive("Reals.Sources.Sin", { amplitude: 2, freqHz: 0.25, offset: 1, startTime: 1 }, at([0, 1, 2])));
    expect(ys[0]).toBe(1);
    expect(ys[1]).toBe(1);
    expect(ys[2]).toBeCloseTo(3);
  });

  it("reports the current time", () => {
    expect(column(drive("Reals.Sources.CivilTime", {}, at([0, 90])))).toEqual([0, 90]);
  });
});

import { describe, expect, it } from "vitest";
import { column, drive, frames, type Frame } from "../test_support.js";

describe("Integers", () => {
  it("compares and offsets", () => {
    const pairs = frames(1, [{ u1: 2, u2: 3 }, { u1: 3, u2: 3 }]);
    expect(column(drive("Integers.Less", {}, pairs))).toEqual([true, false]);
    expect(column(drive("Integers.GreaterEqual", {}, pairs))).toEqual([false, true]);
    expect(column(drive("Integers.AddParameter", { p: -2 }, frames(1, [{ u: 5 }])))).toEqual([3]);
    expect(column(drive("Integers.MultiSum", { nin: 3 }, frames(1, [{ u1: 1, u2: 2, u3: 4 }])))).toEqual([7]);
  });

  it("flags changes and their direction", () => {
    const out = drive("Integers.Change", {}, frames(1, [0, 2, 1, 1].map((u) => ({ u }))));
    expect(column(out)).toEqual([false, true, true, false]);
    expect(column(out, "up")).toEqual([false, true, false, false]);
    expect(column(out, "down")).toEqual([false, false, true, false]);
  });

  it("counts rising edges until reset", () => {
    const steps: [boolean, boolean][] = [
      [true, false],
      [true, false],
      [false, false],
      [true, false],
      [false, true],
      [true, false],
    ];
    const out = drive("Integers.OnCounter", {}, frames(1, steps.map(([trigger, reset]) => ({ trigger, reset }))));
    expect(column(out)).toEqual([1, 1, 1, 2, 0, 1]);
  });

  it("pulses between offset and offset + amplitude", () => {
    const at = [0, 1].map((t): Frame => [t, {}]);
    expect(column(drive("Integers.Sources.Pulse", { amplitude: 3, offset: 1, period: 2 }, at))).toEqual([4, 1]);
  });
});

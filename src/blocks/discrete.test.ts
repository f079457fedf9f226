import { describe, expect, it } from "vitest";
import { column, drive, frames } from "../test_support.js";

const ramp = [1, 2, 3, 4, 5].map((u) => ({ u }));

describe("sampled blocks", () => {
  it("samples every samplePeriod from startTime", () => {
    expect(column(drive("Discrete.Sampler", { samplePeriod: 1 }, frames(0.5, ramp)))).toEqual([1, 1, 3, 3, 5]);
  });

  it("takes a first sample before startTime", () => {
    expect(column(drive("Discrete.Sampler", { samplePeriod: 1, startTime: 1.5 }, frames(0.5, ramp)))).toEqual([1, 1, 1, 4, 4]);
  });

  it("passes u through until the first hold, then holds", () => {
    expect(column(drive("Discrete.ZeroOrderHold", { samplePeriod: 1, startTime: 0.5 }, frames(0.5, ramp)))).toEqual([1, 2, 2, 4, 4]);
  });

  it("extrapolates from the last two samples", () => {
    const inputs = [0, 10, 2, 7, 0].map((u) => ({ u }));
    expect(column(drive("Discrete.FirstOrderHold", { samplePeriod: 1 }, frames(0.5, inputs)))).toEqual([0, 0, 2, 3, 0]);
  });

  it("rejects a non-positive sample period", () => {
    expect(() => drive("Discrete.Sampler", { samplePeriod: 0 }, [])).toThrow("samplePeriod");
  });
});

describe("triggered blocks", () => {
  const pairs = (xs: Array<[number, boolean]>) => xs.map(([u, trigger]) => ({ u, trigger }));

  it("samples on a rising trigger", () => {
    const inputs = pairs([[1, false], [2, true], [3, true], [4, false], [6, true]]);
    expect(column(drive("Discrete.TriggeredSampler", { y_start: 5 }, frames(1, inputs)))).toEqual([5, 2, 2, 2, 6]);
  });

  it("tracks the maximum since the last trigger", () => {
    const inputs = pairs([[3, false], [1, false], [5, false], [2, true], [1, true]]);
    expect(column(drive("Discrete.TriggeredMax", {}, frames(1, inputs)))).toEqual([3, 3, 5, 2, 2]);
  });

  it("averages since the last trigger", () => {
    const inputs = pairs([[2, false], [4, false], [1, true], [3, true]]);
    expect(column(drive("Discrete.TriggeredMovingMean", {}, frames(1, inputs)))).toEqual([2, 3, 1, 2]);
  });
});

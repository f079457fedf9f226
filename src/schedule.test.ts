import { describe, expect, it } from "vitest";
import { SchedulerInvariantError } from "./errors.js";
import type { Link } from "./model.js";
import { computeEvaluationOrder, findCycle } from "./schedule.js";

const nodes = (...names: string[]) => names.map((name, index) => ({ name, index }));

function link(from: string, to: string): Link {
  const [fi, fp] = from.split(".");
  const [ti, tp] = to.split(".");
  return {
    from: fp === undefined ? { port: from } : { instance: fi, port: fp },
    to: tp === undefined ? { port: to } : { instance: ti, port: tp },
  };
}

const names = (xs: Array<{ name: string }>) => xs.map((x) => x.name);

describe("computeEvaluationOrder", () => {
  it("orders producers before consumers", () => {
    const order = computeEvaluationOrder("net", nodes("c", "a", "b"), [link("a.y", "b.u"), link("b.y", "c.u")]);
    expect(names(order)).toEqual(["a", "b", "c"]);
  });

  it("falls back to declaration order among independent instances", () => {
    expect(names(computeEvaluationOrder("net", nodes("x", "y", "z"), []))).toEqual(["x", "y", "z"]);
  });

  it("takes the lowest declaration index among ready instances", () => {
    const order = computeEvaluationOrder("net", nodes("x", "y", "z"), [link("z.y", "x.u")]);
    expect(names(order)).toEqual(["y", "z", "x"]);
  });

  it("ignores links to and from the network's own ports", () => {
    const order = computeEvaluationOrder("net", nodes("b", "a"), [link("u", "a.u"), link("a.y", "y"), link("u", "b.u")]);
    expect(names(order)).toEqual(["b", "a"]);
  });

  it("counts parallel links between the same instances once", () => {
    const order = computeEvaluationOrder("net", nodes("sum", "src"), [link("src.y", "sum.u1"), link("src.y", "sum.u2")]);
    expect(names(order)).toEqual(["src", "sum"]);
  });

  it("reports instances it cannot place", () => {
    const run = () => computeEvaluationOrder("loop", nodes("a", "b", "c"), [link("a.y", "b.u"), link("b.y", "a.u")]);
    expect(run).toThrow(SchedulerInvariantError);
    expect(run).toThrow("loop: no schedulable instance among a, b");
  });
});

describe("findCycle", () => {
  it("returns undefined for an acyclic graph", () => {
    expect(findCycle(nodes("a", "b", "c"), [link("a.y", "b.u"), link("a.y", "c.u"), link("b.y", "c.u2")])).toBeUndefined();
  });

  it("names the instances of a cycle, closing it", () => {
    const links = [link("a.y", "b.u"), link("b.y", "c.u"), link("c.y", "a.u")];
    expect(findCycle(nodes("a", "b", "c"), links)).toEqual(["a", "b", "c", "a"]);
  });

  it("finds a self-loop", () => {
    expect(findCycle(nodes("a"), [link("a.y", "a.u")])).toEqual(["a", "a"]);
  });
});

import { SchedulerInvariantError } from "./errors.js";
import type { Link } from "./model.js";

type Schedulable = { name: string; index: number };

function instanceEdges(links: readonly Link[]): Array<[string, string]> {
  const seen = new Set<string>();
  const edges: Array<[string, string]> = [];
  for (const l of links) {
    const a = l.from.instance;
    const b = l.to.instance;
    if (a === undefined || b === undefined) continue;
    const key = `${a}\u0000${b}`;
    if (seen.has(key)) continue;
    seen.add(key);
    edges.push([a, b]);
  }
  return edges;
}

/**
 * Kahn's algorithm. Among instances whose predecessors are all ordered, the one
 * declared first goes next, so the order is a function of the graph and the
 * declaration indices only.
 */
export function computeEvaluationOrder<T extends Schedulable>(network: string, instances: readonly T[], links: readonly Link[]): T[] {
  const byName = new Map(instances.map((i) => [i.name, i]));
  const pending = new Map<string, number>(instances.map((i) => [i.name, 0]));
  const successors = new Map<string, string[]>();
  for (const [a, b] of instanceEdges(links)) {
    if (!byName.has(a) || !byName.has(b)) continue;
    pending.set(b, (pending.get(b) ?? 0) + 1);
    const list = successors.get(a) ?? [];
    list.push(b);
    successors.set(a, list);
  }

  const ready: T[] = instances.filter((i) => pending.get(i.name) === 0);
  ready.sort((x, y) => x.index - y.index);
  const order: T[] = [];

  while (ready.length > 0) {
    const next = ready.shift();
    if (!next) break;
    order.push(next);
    for (const s of successors.get(next.name) ?? []) {
      const left = (pending.get(s) ?? 0) - 1;
      pending.set(s, left);
      if (left !== 0) continue;
      const inst = byName.get(s);
      if (!inst) continue;
      const at = ready.findIndex((r) => r.index > inst.index);
      if (at < 0) ready.push(inst);
      else ready.splice(at, 0, inst);
    }
  }

  if (order.length !== instances.length) {
    const placed = new Set(order.map((i) => i.name));
    throw new SchedulerInvariantError(
      network,
      instances.filter((i) => !placed.has(i.name)).map((i) => i.name),
    );
  }
  return order;
}

/** One cycle among the instances as `[a, b, ..., a]`, or undefined when the graph is acyclic. */
export function findCycle(instances: readonly Schedulable[], links: readonly Link[]): string[] | undefined {
  const successors = new Map<string, string[]>();
  for (const [a, b] of instanceEdges(links)) {
    const list = successors.get(a) ?? [];
    list.push(b);
    successors.set(a, list);
  }
  const state = new Map<string, "open" | "done">();
  const stack: string[] = [];

  const visit = (name: string): string[] | undefined => {
    state.set(name, "open");
    stack.push(name);
    for (const s of successors.get(name) ?? []) {
      const st = state.get(s);
      if (st === "open") return [...stack.slice(stack.indexOf(s)), s];
      if (st === undefined) {
        const found = visit(s);
        if (found) return found;
      }
    }
    stack.pop();
    state.set(name, "done");
    return undefined;
  };

  const ordered = [...instances].sort((x, y) => x.index - y.index);
  for (const i of ordered) {
    if (state.has(i.name)) continue;
    const found = visit(i.name);
    if (found) return found;
  }
  return undefined;
}

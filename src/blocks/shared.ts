import { z } from "zod";
import type { PortSpec, SignalMap, SignalType } from "../block.js";
import { DomainError } from "../errors.js";

export function port(name: string, type: SignalType = "Real", extra: Omit<PortSpec, "name" | "type"> = {}): PortSpec {
  return { name, type, ...extra };
}

export function num(inputs: SignalMap, name: string): number {
  const v = inputs[name];
  if (typeof v === "number") return v;
  throw new DomainError(`input '${name}' is ${v === undefined ? "missing" : `not numeric (${String(v)})`}`);
}

export function bool(inputs: SignalMap, name: string): boolean {
  const v = inputs[name];
  if (typeof v === "boolean") return v;
  throw new DomainError(`input '${name}' is ${v === undefined ? "missing" : `not boolean (${String(v)})`}`);
}

/** `prefix1` .. `prefixN`, the scalar ports standing in for one vector connector. */
export function portVector(prefix: string, n: number, type: SignalType = "Real"): PortSpec[] {
  return Array.from({ length: n }, (_, i) => port(`${prefix}${i + 1}`, type));
}

export function numVector(inputs: SignalMap, prefix: string, n: number): number[] {
  return Array.from({ length: n }, (_, i) => num(inputs, `${prefix}${i + 1}`));
}

export function boolVector(inputs: SignalMap, prefix: string, n: number): boolean[] {
  return Array.from({ length: n }, (_, i) => bool(inputs, `${prefix}${i + 1}`));
}

/** Port count of a vector block; at least one element. */
export const width = z.number().int().min(1);

/** Time elapsed in a periodic signal, or undefined before it starts. */
export function phaseOf(time: number, period: number, shift: number): number | undefined {
  const t = time - shift;
  if (t < 0) return undefined;
  return t % period;
}

import type { Block, PortSpec, Signal, SignalMap, StateSlot, StepContext, Steppable } from "./block.js";
import { signalMatches } from "./document_parse.js";
import { CdlError, MalformedDocumentError, StepEvaluationError } from "./errors.js";
import { formatPortRef, isParamRef, type BlockInstance, type NetworkModel, type PortRef } from "./model.js";
import { signalAssignable } from "./network_validate.js";
import { die, errorMessage } from "./util.js";

type Feed = {
  port: string;
  from?: PortRef;
  fallback?: Signal;
};

type RuntimeNode = {
  name: string;
  block: Block;
  feeds: Feed[];
  outputs: readonly string[];
};

function feedKey(ref: PortRef): string {
  return formatPortRef(ref);
}

/** Parameter scope of a network: declared defaults overridden by `params`. */
export function bindParameters(model: NetworkModel, params: Record<string, Signal>): Record<string, Signal> {
  const scope: Record<string, Signal> = {};
  for (const p of model.parameters) scope[p.name] = p.value;
  for (const [k, v] of Object.entries(params)) {
    const decl = model.parameter(k);
    if (!decl) throw new MalformedDocumentError(model.name, `parameters.${k}`, "no such parameter");
    if (!signalMatches(decl.type, v)) throw new MalformedDocumentError(model.name, `parameters.${k}`, `expected a ${decl.type}`);
    scope[k] = v;
  }
  return scope;
}

export function instanceParameters(inst: BlockInstance, scope: Record<string, Signal>): Record<string, Signal> {
  const out: Record<string, Signal> = {};
  for (const [k, expr] of Object.entries(inst.parameters)) {
    out[k] = isParamRef(expr) ? (scope[expr.param] ?? die(`unbound parameter '${expr.param}' for ${inst.name}.${k}`)) : expr;
  }
  return out;
}

/**
 * Runs the evaluate hook of one instance, tagging any failure with its name.
 * Each port named in `outputs` must then hold a finite value.
 */
export function evaluateInstance(
  name: string,
  block: Steppable,
  inputs: SignalMap,
  ctx: StepContext,
  outputs: readonly string[] = [],
): SignalMap {
  let out: SignalMap;
  try {
    out = block.evaluate(inputs, ctx);
  } catch (e) {
    if (e instanceof StepEvaluationError) throw e.within(name);
    throw new StepEvaluationError([name], errorMessage(e), { cause: e });
  }
  for (const port of outputs) readSignal(out, port, name);
  return out;
}

/**
 * Reads one signal out of a map. Without `instance` the map holds network
 * inputs; with it, the outputs `instance` just produced, which must be finite.
 */
export function readSignal(map: SignalMap, port: string, instance?: string): Signal {
  const v = map[port];
  if (instance === undefined) {
    if (v === undefined) throw new StepEvaluationError([], `missing input '${port}'`);
    return v;
  }
  if (v === undefined) throw new StepEvaluationError([instance], `no value for output '${port}'`);
  if (typeof v === "number" && !Number.isFinite(v)) {
    throw new StepEvaluationError([instance], `non-finite value ${v} on output '${port}'`);
  }
  return v;
}

export function readNumber(map: SignalMap, port: string, instance?: string): number {
  const v = readSignal(map, port, instance);
  if (typeof v !== "number") throw new StepEvaluationError(instance ? [instance] : [], `'${port}' is not numeric`);
  return v;
}

export function readBoolean(map: SignalMap, port: string, instance?: string): boolean {
  const v = readSignal(map, port, instance);
  if (typeof v !== "boolean") throw new StepEvaluationError(instance ? [instance] : [], `'${port}' is not boolean`);
  return v;
}

/**
 * Executable form of a network model. It is itself a block, so composite
 * instances nest one runtime inside another.
 */
export class NetworkRuntime implements Block {
  readonly inputs: readonly PortSpec[];
  readonly outputs: readonly PortSpec[];
  readonly parameters: Readonly<Record<string, Signal>>;
  private readonly nodes: RuntimeNode[];
  private readonly byName = new Map<string, RuntimeNode>();
  private readonly outputFeeds: Feed[];

  constructor(
    readonly model: NetworkModel,
    params: Record<string, Signal> = {},
  ) {
    this.inputs = model.inputs;
    this.outputs = model.outputs;
    this.parameters = bindParameters(model, params);

    const incoming = new Map<string, PortRef>();
    for (const l of model.links()) incoming.set(feedKey(l.to), l.from);

    this.nodes = model.evaluationOrder().map((inst) => {
      const node: RuntimeNode = {
        name: inst.name,
        block: this.instantiate(inst),
        feeds: inst.inputs.map((p) => ({
          port: p.name,
          from: incoming.get(`${inst.name}.${p.name}`),
          fallback: p.default,
        })),
        outputs: inst.outputs.map((p) => p.name),
      };
      this.byName.set(inst.name, node);
      return node;
    });
    this.outputFeeds = model.outputs.map((p) => ({ port: p.name, from: incoming.get(p.name) }));
  }

  private instantiate(inst: BlockInstance): Block {
    const values = instanceParameters(inst, this.parameters);
    if (inst.kind === "composite") return new NetworkRuntime(inst.network, values);
    const res = inst.blockType.checkParameters(values);
    if (!res.success) {
      const issue = res.error.issues[0];
      throw new MalformedDocumentError(
        `${this.model.name}.${inst.name}`,
        ["parameters", ...(issue?.path ?? [])].join("."),
        issue?.message ?? "invalid parameters",
      );
    }
    return inst.blockType.create(values);
  }

  private checkInputs(inputs: SignalMap): void {
    for (const p of this.inputs) {
      const v = inputs[p.name];
      if (v === undefined) throw new StepEvaluationError([], `missing input '${p.name}'`);
      const type = typeof v === "boolean" ? "Boolean" : Number.isInteger(v) ? "Integer" : "Real";
      if (!signalAssignable(type, p.type)) {
        throw new StepEvaluationError([], `input '${p.name}' expects a ${p.type}, got ${String(v)}`);
      }
    }
  }

  /** Evaluate phase: every instance once, in scheduler order. Committed state is left untouched. */
  evaluate(inputs: SignalMap, ctx: StepContext): SignalMap {
    try {
      this.checkInputs(inputs);
      const produced = new Map<string, SignalMap>();
      const read = (feed: Feed): Signal => {
        if (!feed.from) return feed.fallback ?? die(`input '${feed.port}' has neither connection nor default`);
        const src = feed.from.instance === undefined ? inputs : produced.get(feed.from.instance);
        const v = src?.[feed.from.port];
        return v ?? die(`no value on ${feedKey(feed.from)} when reading it`);
      };

      for (const node of this.nodes) {
        const args: SignalMap = {};
        for (const f of node.feeds) args[f.port] = read(f);
        produced.set(node.name, evaluateInstance(node.name, node.block, args, ctx, node.outputs));
      }

      const result: SignalMap = {};
      for (const f of this.outputFeeds) result[f.port] = read(f);
      return result;
    } catch (e) {
      this.discard();
      if (e instanceof CdlError) throw e;
      throw new StepEvaluationError([], errorMessage(e), { cause: e });
    }
  }

  /** Commit phase; each instance promotes only its own staged state, so order is irrelevant. */
  commit(): void {
    for (const node of this.nodes) node.block.commit();
  }

  discard(): void {
    for (const node of this.nodes) node.block.discard();
  }

  /**
   * One step: evaluate everything, then commit everything. A failure in any
   * evaluate leaves every committed state as it was.
   */
  step(inputs: SignalMap, ctx: StepContext): SignalMap {
    const outputs = this.evaluate(inputs, ctx);
    this.commit();
    return outputs;
  }

  stateSlots(prefix = ""): StateSlot[] {
    const slots: StateSlot[] = [];
    for (const inst of this.model.instances) {
      const node = this.byName.get(inst.name);
      if (!node) continue;
      slots.push(...node.block.stateSlots(prefix ? `${prefix}.${inst.name}` : inst.name));
    }
    return slots;
  }

  instance(name: string): Block | undefined {
    return this.byName.get(name)?.block;
  }
}

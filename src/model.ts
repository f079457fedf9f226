import type { BlockType, PortSpec, Signal, SignalType } from "./block.js";
import { computeEvaluationOrder } from "./schedule.js";

/** `instance` is absent for the network's own external ports. */
export type PortRef = {
  instance?: string;
  port: string;
};

export type Connection = {
  source: PortRef;
  destinations: PortRef[];
};

export type Link = {
  from: PortRef;
  to: PortRef;
};

/** A literal, or a reference to a parameter of the enclosing composite. */
export type ParamExpr = Signal | { param: string };

export type ParameterDecl = {
  name: string;
  type: SignalType;
  value: Signal;
  description: string;
};

type InstanceBase = {
  name: string;
  typeName: string;
  parameters: Record<string, ParamExpr>;
  /** Position in the declaration; breaks scheduling ties. */
  index: number;
  inputs: readonly PortSpec[];
  outputs: readonly PortSpec[];
};

export type ElementaryInstance = InstanceBase & {
  kind: "elementary";
  blockType: BlockType;
};

export type CompositeInstance = InstanceBase & {
  kind: "composite";
  /** Shared handle to the memoized model of the composite type. */
  network: NetworkModel;
};

export type BlockInstance = ElementaryInstance | CompositeInstance;

export type NetworkModelInit = {
  name: string;
  description?: string;
  source?: string;
  parameters?: ParameterDecl[];
  inputs?: PortSpec[];
  outputs?: PortSpec[];
  instances?: BlockInstance[];
  connections?: Connection[];
};

export function parsePortRef(text: string): PortRef {
  const dot = text.indexOf(".");
  if (dot < 0) return { port: text };
  return { instance: text.slice(0, dot), port: text.slice(dot + 1) };
}

export function formatPortRef(ref: PortRef): string {
  return ref.instance === undefined ? ref.port : `${ref.instance}.${ref.port}`;
}

export function isParamRef(v: ParamExpr): v is { param: string } {
  return typeof v === "object";
}

export class NetworkModel {
  readonly name: string;
  readonly description: string;
  readonly source: string | undefined;
  readonly parameters: readonly ParameterDecl[];
  readonly inputs: readonly PortSpec[];
  readonly outputs: readonly PortSpec[];
  readonly instances: readonly BlockInstance[];
  private conns: Connection[];
  private order: BlockInstance[] | undefined;

  constructor(init: NetworkModelInit) {
    this.name = init.name;
    this.description = init.description ?? "";
    this.source = init.source;
    this.parameters = init.parameters ?? [];
    this.inputs = init.inputs ?? [];
    this.outputs = init.outputs ?? [];
    this.instances = init.instances ?? [];
    this.conns = [...(init.connections ?? [])];
  }

  get connections(): readonly Connection[] {
    return this.conns;
  }

  setConnections(connections: Connection[]): void {
    this.conns = [...connections];
    this.order = undefined;
  }

  addConnection(connection: Connection): void {
    this.conns.push(connection);
    this.order = undefined;
  }

  links(): Link[] {
    return this.conns.flatMap((c) => c.destinations.map((to) => ({ from: c.source, to })));
  }

  instance(name: string): BlockInstance | undefined {
    return this.instances.find((i) => i.name === name);
  }

  parameter(name: string): ParameterDecl | undefined {
    return this.parameters.find((p) => p.name === name);
  }

  /** Computed on first use and kept until the connection set changes. */
  evaluationOrder(): readonly BlockInstance[] {
    this.order ??= computeEvaluationOrder(this.name, this.instances, this.links());
    return this.order;
  }

  /** Distinct composite types used directly by this network, in declaration order. */
  dependencies(): NetworkModel[] {
    const out: NetworkModel[] = [];
    for (const inst of this.instances) {
      if (inst.kind === "composite" && !out.includes(inst.network)) out.push(inst.network);
    }
    return out;
  }
}

/** Every network reachable from `root`, leaves first and `root` last. */
export function dependencyOrder(root: NetworkModel): NetworkModel[] {
  const out: NetworkModel[] = [];
  const visit = (n: NetworkModel) => {
    if (out.includes(n)) return;
    for (const d of n.dependencies()) visit(d);
    out.push(n);
  };
  visit(root);
  return out;
}

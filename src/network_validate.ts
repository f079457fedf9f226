import type { BlockType, PortSpec, Signal, SignalType } from "./block.js";
import { signalMatches, type CompositeDefinition, type InstanceDecl } from "./document_parse.js";
import {
  AlgebraicLoopError,
  DanglingConnectionError,
  MalformedDocumentError,
  PortArityError,
} from "./errors.js";
import {
  formatPortRef,
  isParamRef,
  NetworkModel,
  type BlockInstance,
  type Link,
  type PortRef,
} from "./model.js";
import { findCycle } from "./schedule.js";

export type ResolvedType =
  | { kind: "elementary"; blockType: BlockType }
  | { kind: "composite"; network: NetworkModel };

export function signalAssignable(from: SignalType, to: SignalType): boolean {
  return from === to || (from === "Integer" && to === "Real");
}

/** Parameter values with references to `def`'s parameters replaced by their declared defaults. */
function bindDefaults(def: CompositeDefinition, inst: InstanceDecl): Record<string, Signal> {
  const out: Record<string, Signal> = {};
  for (const [k, v] of Object.entries(inst.parameters)) {
    out[k] = isParamRef(v) ? referencedParameter(def, inst, k, v.param).value : v;
  }
  return out;
}

function referencedParameter(def: CompositeDefinition, inst: InstanceDecl, key: string, name: string) {
  const p = def.parameters.find((x) => x.name === name);
  if (!p) {
    throw new MalformedDocumentError(`${def.name}.${inst.name}`, `parameters.${key}`, `no parameter '${name}' in ${def.name}`);
  }
  return p;
}

function checkElementaryParameters(def: CompositeDefinition, inst: InstanceDecl, type: BlockType): void {
  const res = type.checkParameters(bindDefaults(def, inst));
  if (res.success) return;
  const issue = res.error.issues[0];
  const field = ["parameters", ...(issue?.path ?? [])].join(".");
  throw new MalformedDocumentError(`${def.name}.${inst.name}`, field, issue?.message ?? "invalid parameters");
}

/** Parameters that set an instance's port count cannot vary with the enclosing composite's parameters. */
function checkStructuralParameters(def: CompositeDefinition, inst: InstanceDecl, type: BlockType): void {
  for (const key of type.structural) {
    const expr = inst.parameters[key];
    if (expr !== undefined && isParamRef(expr)) {
      throw new MalformedDocumentError(`${def.name}.${inst.name}`, `parameters.${key}`, "must be a literal, it sets the number of ports");
    }
  }
}

function checkCompositeParameters(def: CompositeDefinition, inst: InstanceDecl, child: NetworkModel): void {
  for (const [key, expr] of Object.entries(inst.parameters)) {
    const node = `${def.name}.${inst.name}`;
    const decl = child.parameter(key);
    if (!decl) throw new MalformedDocumentError(node, `parameters.${key}`, `${child.name} declares no parameter '${key}'`);
    const ok = isParamRef(expr)
      ? signalAssignable(referencedParameter(def, inst, key, expr.param).type, decl.type)
      : signalMatches(decl.type, expr);
    if (!ok) throw new MalformedDocumentError(node, `parameters.${key}`, `expected a ${decl.type}`);
  }
}

function toInstance(def: CompositeDefinition, inst: InstanceDecl, resolved: ResolvedType): BlockInstance {
  const base = { name: inst.name, typeName: inst.typeName, parameters: inst.parameters, index: inst.index };
  if (resolved.kind === "elementary") {
    checkStructuralParameters(def, inst, resolved.blockType);
    checkElementaryParameters(def, inst, resolved.blockType);
    return {
      ...base,
      kind: "elementary",
      blockType: resolved.blockType,
      ...resolved.blockType.portsFor(bindDefaults(def, inst)),
    };
  }
  checkCompositeParameters(def, inst, resolved.network);
  return {
    ...base,
    kind: "composite",
    network: resolved.network,
    inputs: resolved.network.inputs,
    outputs: resolved.network.outputs,
  };
}

type Endpoints = {
  network: string;
  instances: Map<string, BlockInstance>;
  inputs: readonly PortSpec[];
  outputs: readonly PortSpec[];
};

function sourcePort(ep: Endpoints, ref: PortRef): PortSpec {
  const text = formatPortRef(ref);
  if (ref.instance === undefined) {
    const p = ep.inputs.find((x) => x.name === ref.port);
    if (p) return p;
    const why = ep.outputs.some((x) => x.name === ref.port) ? "is a network output, not a source" : "no such network input";
    throw new DanglingConnectionError(ep.network, text, why);
  }
  const inst = ep.instances.get(ref.instance);
  if (!inst) throw new DanglingConnectionError(ep.network, text, `no instance '${ref.instance}'`);
  const p = inst.outputs.find((x) => x.name === ref.port);
  if (p) return p;
  const why = inst.inputs.some((x) => x.name === ref.port) ? "is an input port, not a source" : `${inst.typeName} has no output '${ref.port}'`;
  throw new DanglingConnectionError(ep.network, text, why);
}

function destinationPort(ep: Endpoints, ref: PortRef): PortSpec {
  const text = formatPortRef(ref);
  if (ref.instance === undefined) {
    const p = ep.outputs.find((x) => x.name === ref.port);
    if (p) return p;
    const why = ep.inputs.some((x) => x.name === ref.port) ? "is a network input, not a destination" : "no such network output";
    throw new DanglingConnectionError(ep.network, text, why);
  }
  const inst = ep.instances.get(ref.instance);
  if (!inst) throw new DanglingConnectionError(ep.network, text, `no instance '${ref.instance}'`);
  const p = inst.inputs.find((x) => x.name === ref.port);
  if (p) return p;
  const why = inst.outputs.some((x) => x.name === ref.port) ? "is an output port, not a destination" : `${inst.typeName} has no input '${ref.port}'`;
  throw new DanglingConnectionError(ep.network, text, why);
}

function checkLinks(ep: Endpoints, links: Link[]): void {
  const incoming = new Map<string, number>();
  for (const l of links) {
    const from = sourcePort(ep, l.from);
    const to = destinationPort(ep, l.to);
    if (!signalAssignable(from.type, to.type)) {
      throw new MalformedDocumentError(
        ep.network,
        "connections",
        `${formatPortRef(l.from)} (${from.type}) cannot drive ${formatPortRef(l.to)} (${to.type})`,
      );
    }
    const key = formatPortRef(l.to);
    incoming.set(key, (incoming.get(key) ?? 0) + 1);
  }

  const expectOne = (key: string, optional: boolean) => {
    const n = incoming.get(key) ?? 0;
    if (n > 1 || (n === 0 && !optional)) throw new PortArityError(ep.network, key, n);
  };
  for (const inst of ep.instances.values()) {
    for (const p of inst.inputs) expectOne(`${inst.name}.${p.name}`, p.default !== undefined);
  }
  for (const p of ep.outputs) expectOne(p.name, false);
}

/**
 * Binds resolved instance types to a parsed definition and checks the result:
 * parameters against the block type, connection endpoints, single assignment
 * of every input and acyclicity.
 */
export function buildNetworkModel(
  def: CompositeDefinition,
  types: Map<string, ResolvedType>,
  source?: string,
): NetworkModel {
  const instances = def.instances.map((inst) => {
    const resolved = types.get(inst.name);
    if (!resolved) throw new MalformedDocumentError(`${def.name}.${inst.name}`, "@type", `type '${inst.typeName}' was not resolved`);
    return toInstance(def, inst, resolved);
  });

  const model = new NetworkModel({
    name: def.name,
    description: def.description,
    source,
    parameters: def.parameters,
    inputs: def.inputs,
    outputs: def.outputs,
    instances,
    connections: def.connections,
  });

  const links = model.links();
  checkLinks(
    { network: def.name, instances: new Map(instances.map((i) => [i.name, i])), inputs: def.inputs, outputs: def.outputs },
    links,
  );
  const cycle = findCycle(instances, links);
  if (cycle) throw new AlgebraicLoopError(def.name, cycle);
  return model;
}

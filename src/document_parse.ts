import fs from "fs";
import path from "path";
import { z } from "zod";
import type { PortSpec, Signal, SignalType } from "./block.js";
import { compositeName } from "./blocks/catalog.js";
import {
  COMPOSITE_TYPE,
  compositeNodeSchema,
  documentSchema,
  instanceNodeSchema,
  type CompositeNode,
  type InstanceNode,
} from "./document_schema.js";
import { MalformedDocumentError } from "./errors.js";
import { parsePortRef, type Connection, type ParamExpr, type ParameterDecl, type PortRef } from "./model.js";
import { errorMessage, isIdentifier, readText } from "./util.js";

export type InstanceDecl = {
  name: string;
  typeName: string;
  parameters: Record<string, ParamExpr>;
  index: number;
};

/** A composite as declared, before its instance types are resolved. */
export type CompositeDefinition = {
  name: string;
  description: string;
  parameters: ParameterDecl[];
  inputs: PortSpec[];
  outputs: PortSpec[];
  instances: InstanceDecl[];
  connections: Connection[];
};

export type ParsedDocument = {
  source?: string;
  /** Directory composite references are first looked up in. */
  baseDir?: string;
  /** Name of the top-level composite (the first one in `@graph`). */
  root: string;
  definitions: Map<string, CompositeDefinition>;
};

const DOCUMENT = "<document>";

function fail(node: string, error: z.ZodError): never {
  const issue = error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join(".") : "<node>";
  throw new MalformedDocumentError(node, field, issue?.message ?? "invalid");
}

export function signalMatches(type: SignalType, v: Signal): boolean {
  if (type === "Boolean") return typeof v === "boolean";
  if (typeof v !== "number") return false;
  return type === "Real" || Number.isInteger(v);
}

function checkName(node: string, field: string, name: string): void {
  if (!isIdentifier(name)) throw new MalformedDocumentError(node, field, `'${name}' is not a valid identifier`);
}

function checkPorts(node: string, field: string, ports: Array<{ name: string }>, taken: Set<string>): void {
  ports.forEach((p, i) => {
    checkName(node, `${field}[${i}].name`, p.name);
    if (taken.has(p.name)) throw new MalformedDocumentError(node, `${field}[${i}].name`, `duplicate name '${p.name}'`);
    taken.add(p.name);
  });
}

function toParamExprs(params: InstanceNode["parameters"]): Record<string, ParamExpr> {
  const out: Record<string, ParamExpr> = {};
  for (const [k, v] of Object.entries(params)) {
    out[k] = typeof v === "object" ? { param: v["@param"] } : v;
  }
  return out;
}

function portRef(node: string, field: string, text: string): PortRef {
  const ref = parsePortRef(text);
  if ((ref.instance !== undefined && !isIdentifier(ref.instance)) || !isIdentifier(ref.port)) {
    throw new MalformedDocumentError(node, field, `'${text}' is not of the form 'instance.port' or 'port'`);
  }
  return ref;
}

function toDefinition(node: CompositeNode, instanceNodes: Map<string, InstanceNode>): CompositeDefinition {
  const name = compositeName(node["@id"]);
  checkName(name, "@id", name);

  const params = new Set<string>();
  checkPorts(name, "parameters", node.parameters, params);
  node.parameters.forEach((p, i) => {
    if (!signalMatches(p.type, p.value)) {
      throw new MalformedDocumentError(name, `parameters[${i}].value`, `${String(p.value)} is not a ${p.type}`);
    }
  });
  const ports = new Set<string>();
  checkPorts(name, "inputs", node.inputs, ports);
  checkPorts(name, "outputs", node.outputs, ports);

  const instances: InstanceDecl[] = [];
  const seen = new Set<string>();
  node.instances.forEach((entry, index) => {
    const field = `instances[${index}]`;
    let decl: InstanceNode;
    if (typeof entry === "string") {
      const target = instanceNodes.get(entry.slice(1));
      if (!target) throw new MalformedDocumentError(name, field, `'${entry}' does not name an instance node of this document`);
      decl = target;
    } else {
      decl = entry;
    }
    const instName = compositeName(decl["@id"]);
    checkName(name, `${field}.@id`, instName);
    if (seen.has(instName)) throw new MalformedDocumentError(name, `${field}.@id`, `duplicate instance '${instName}'`);
    seen.add(instName);
    instances.push({ name: instName, typeName: decl["@type"], parameters: toParamExprs(decl.parameters), index });
  });

  const connections = node.connections.map((c, i) => ({
    source: portRef(name, `connections[${i}].source`, c.source),
    destinations: c.destinations.map((d, j) => portRef(name, `connections[${i}].destinations[${j}]`, d)),
  }));

  return {
    name,
    description: node.description,
    parameters: node.parameters.map((p) => ({ name: p.name, type: p.type, value: p.value, description: p.description })),
    inputs: node.inputs.map((p) => ({ name: p.name, type: p.type, description: p.description })),
    outputs: node.outputs.map((p) => ({ name: p.name, type: p.type, description: p.description })),
    instances,
    connections,
  };
}

/**
 * Decodes an exchange-format document. Composite nodes become definitions;
 * other root nodes are instance declarations that composites pull in by
 * `"#<id>"` reference.
 */
export function parseDocument(raw: unknown, source?: string): ParsedDocument {
  const doc = documentSchema.safeParse(raw);
  if (!doc.success) fail(DOCUMENT, doc.error);

  const ids = new Set<string>();
  const composites: CompositeNode[] = [];
  const instanceNodes = new Map<string, InstanceNode>();

  doc.data["@graph"].forEach((node, i) => {
    const id = node["@id"];
    if (typeof id !== "string" || id.length === 0) {
      throw new MalformedDocumentError(`@graph[${i}]`, "@id", "missing node identifier");
    }
    if (typeof node["@type"] !== "string") throw new MalformedDocumentError(id, "@type", "missing type tag");
    if (ids.has(id)) throw new MalformedDocumentError(id, "@id", "duplicate node identifier");
    ids.add(id);

    if (node["@type"] === COMPOSITE_TYPE) {
      const parsed = compositeNodeSchema.safeParse(node);
      if (!parsed.success) fail(id, parsed.error);
      composites.push(parsed.data);
    } else {
      const parsed = instanceNodeSchema.safeParse(node);
      if (!parsed.success) fail(id, parsed.error);
      instanceNodes.set(id, parsed.data);
    }
  });

  const first = composites[0];
  if (!first) throw new MalformedDocumentError(DOCUMENT, "@graph", `no ${COMPOSITE_TYPE} node`);

  const definitions = new Map<string, CompositeDefinition>();
  for (const node of composites) {
    const def = toDefinition(node, instanceNodes);
    if (definitions.has(def.name)) throw new MalformedDocumentError(def.name, "@id", "composite defined twice");
    definitions.set(def.name, def);
  }

  return {
    source,
    baseDir: source ? path.dirname(source) : undefined,
    root: compositeName(first["@id"]),
    definitions,
  };
}

export function parseDocumentText(text: string, source?: string): ParsedDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new MalformedDocumentError(source ?? DOCUMENT, "<json>", errorMessage(e));
  }
  return parseDocument(raw, source);
}

export function parseDocumentFile(file: string): ParsedDocument {
  const abs = path.resolve(file);
  if (!fs.existsSync(abs)) throw new MalformedDocumentError(abs, "<file>", "file not found");
  return parseDocumentText(readText(abs), abs);
}

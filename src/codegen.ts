import type { PortSpec, Signal, SignalType } from "./block.js";
import { formatPortRef, isParamRef, type BlockInstance, type NetworkModel, type ParamExpr, type PortRef } from "./model.js";

export const DEFAULT_RUNTIME_MODULE = "cdlnet";

/** Namespace the runtime module is imported under; `$` keeps it apart from composite names. */
const RT = "$cdl";

export type GenerateOptions = {
  /** Module specifier the artifacts import the runtime from. */
  runtimeModule?: string;
};

export type Artifact = {
  name: string;
  fileName: string;
  code: string;
};

function tsType(t: SignalType): string {
  return t === "Boolean" ? "boolean" : "number";
}

function lit(v: Signal): string {
  return JSON.stringify(v);
}

function str(s: string): string {
  return JSON.stringify(s);
}

function docComment(text: string, indent: string): string[] {
  const body = text.trim();
  if (!body) return [];
  return [`${indent}/** ${body.replace(/\*\//g, "*\\/").replace(/\s*\n\s*/g, " ")} */`];
}

function typeBlock(name: string, fields: ReadonlyArray<{ name: string; type: SignalType }>): string[] {
  if (fields.length === 0) return [`export type ${name} = Record<string, never>;`];
  return [`export type ${name} = {`, ...fields.map((f) => `  ${f.name}: ${tsType(f.type)};`), "};"];
}

function outVar(instance: string): string {
  return `${instance}Out`;
}

function paramArg(expr: ParamExpr): string {
  return isParamRef(expr) ? `this.parameters.${expr.param}` : lit(expr);
}

function paramObject(params: Record<string, ParamExpr>): string {
  const entries = Object.entries(params);
  if (entries.length === 0) return "{}";
  return `{ ${entries.map(([k, v]) => `${k}: ${paramArg(v)}`).join(", ")} }`;
}

function construct(inst: BlockInstance): string {
  if (inst.kind === "composite") {
    const args = Object.keys(inst.parameters).length > 0 ? paramObject(inst.parameters) : "";
    return `new ${inst.network.name}(${args})`;
  }
  return `${RT}.createElementary(${str(inst.blockType.type)}, ${paramObject(inst.parameters)})`;
}

function memberType(inst: BlockInstance): string {
  return inst.kind === "composite" ? inst.network.name : `${RT}.Steppable`;
}

/** Expression that reads `from` during evaluate; `reader` picks the typed helper. */
function readExpr(from: PortRef, reader: string): string {
  if (from.instance === undefined) return `${RT}.${reader}(inputs, ${str(from.port)})`;
  return `${RT}.${reader}(${outVar(from.instance)}, ${str(from.port)}, ${str(from.instance)})`;
}

function feedExpr(model: NetworkModel, incoming: Map<string, PortRef>, key: string, spec: PortSpec, reader: string): string {
  const from = incoming.get(key);
  if (from) return readExpr(from, reader);
  if (spec.default !== undefined) return lit(spec.default);
  throw new Error(`${model.name}: '${key}' has neither a connection nor a default`);
}

/**
 * One TypeScript module for one composite type. The output depends on the
 * model alone, so equal models give byte-equal modules.
 */
export function generateArtifact(model: NetworkModel, opts: GenerateOptions = {}): Artifact {
  const runtime = opts.runtimeModule ?? DEFAULT_RUNTIME_MODULE;
  const name = model.name;
  const incoming = new Map<string, PortRef>();
  for (const l of model.links()) incoming.set(formatPortRef(l.to), l.from);

  const out: string[] = [];
  out.push(`// Generated by cdlnet from composite ${name}. Do not edit.`);
  out.push("");
  out.push(`import * as ${RT} from ${str(runtime)};`);
  for (const dep of model.dependencies()) out.push(`import { ${dep.name} } from ${str(`./${dep.name}.js`)};`);
  out.push("");

  out.push(...typeBlock(`${name}Parameters`, model.parameters));
  out.push("");
  out.push(...typeBlock(`${name}Inputs`, model.inputs));
  out.push("");
  out.push(...typeBlock(`${name}Outputs`, model.outputs));
  out.push("");

  out.push(...docComment(model.description, ""));
  out.push(`export class ${name} implements ${RT}.Steppable {`);
  out.push(`  readonly parameters: ${name}Parameters;`);
  if (model.instances.length > 0) {
    out.push("  private readonly blocks: {");
    for (const inst of model.instances) out.push(`    ${inst.name}: ${memberType(inst)};`);
    out.push("  };");
  }
  out.push("  private steps = 0;");
  out.push("");

  if (model.parameters.length > 0) {
    out.push(`  constructor(params: Partial<${name}Parameters> = {}) {`);
    const defaults = model.parameters.map((p) => `${p.name}: ${lit(p.value)}`).join(", ");
    out.push(`    this.parameters = { ${defaults}, ...params };`);
  } else {
    out.push("  constructor() {");
    out.push("    this.parameters = {};");
  }
  if (model.instances.length > 0) {
    out.push("    this.blocks = {");
    for (const inst of model.instances) out.push(`      ${inst.name}: ${construct(inst)},`);
    out.push("    };");
  }
  out.push("  }");
  out.push("");

  out.push(`  evaluate(inputs: ${RT}.SignalMap, ctx: ${RT}.StepContext): ${name}Outputs {`);
  for (const inst of model.evaluationOrder()) {
    const args = inst.inputs.map((p) => `${p.name}: ${feedExpr(model, incoming, `${inst.name}.${p.name}`, p, "readSignal")}`);
    const argText = args.length > 0 ? `{ ${args.join(", ")} }` : "{}";
    const ports = `[${inst.outputs.map((p) => str(p.name)).join(", ")}]`;
    out.push(
      `    const ${outVar(inst.name)} = ${RT}.evaluateInstance(${str(inst.name)}, this.blocks.${inst.name}, ${argText}, ctx, ${ports});`,
    );
  }
  if (model.outputs.length === 0) {
    out.push("    return {};");
  } else {
    out.push("    return {");
    for (const p of model.outputs) {
      const reader = p.type === "Boolean" ? "readBoolean" : "readNumber";
      out.push(`      ${p.name}: ${feedExpr(model, incoming, p.name, p, reader)},`);
    }
    out.push("    };");
  }
  out.push("  }");
  out.push("");

  out.push("  commit(): void {");
  for (const inst of model.instances) out.push(`    this.blocks.${inst.name}.commit();`);
  out.push("  }");
  out.push("");
  out.push("  discard(): void {");
  for (const inst of model.instances) out.push(`    this.blocks.${inst.name}.discard();`);
  out.push("  }");
  out.push("");

  out.push("  /** Evaluates every instance, then commits them all. Without `ctx`, time counts steps with dt = 1. */");
  out.push(`  step(inputs: ${name}Inputs, ctx: Partial<${RT}.StepContext> = {}): ${name}Outputs {`);
  out.push(`    const at: ${RT}.StepContext = { time: this.steps, dt: 1, step: this.steps, ...ctx };`);
  out.push(`    let outputs: ${name}Outputs;`);
  out.push("    try {");
  out.push("      outputs = this.evaluate(inputs, at);");
  out.push("    } catch (e) {");
  out.push("      this.discard();");
  out.push("      throw e;");
  out.push("    }");
  out.push("    this.commit();");
  out.push("    this.steps += 1;");
  out.push("    return outputs;");
  out.push("  }");
  out.push("}");
  out.push("");

  return { name, fileName: `${name}.ts`, code: out.join("\n") };
}

/** Artifacts for `networks` in the order given, which callers keep leaves first. */
export function generateArtifacts(networks: readonly NetworkModel[], opts: GenerateOptions = {}): Artifact[] {
  return networks.map((n) => generateArtifact(n, opts));
}

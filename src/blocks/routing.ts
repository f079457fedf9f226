import { z } from "zod";
import { defineBlock, type BlockType, type Signal, type SignalMap, type SignalType } from "../block.js";
import { DomainError } from "../errors.js";
import { num, port, portVector, width } from "./shared.js";

type Family = { name: string; type: SignalType };

const families: Family[] = [
  { name: "Real", type: "Real" },
  { name: "Integer", type: "Integer" },
  { name: "Boolean", type: "Boolean" },
];

/** Input `u<i>` with i clamped to [1, n]. */
function element(inputs: SignalMap, i: number, n: number): Signal {
  const k = Math.max(1, Math.min(n, Math.round(i)));
  const v = inputs[`u${k}`];
  if (v === undefined) throw new DomainError(`input 'u${k}' is missing`);
  return v;
}

function extractor({ name, type }: Family): BlockType {
  return defineBlock({
    type: `Routing.${name}Extractor`,
    description: "y = u[index], index clamped to [1, nin]",
    parameters: z.object({ nin: width.default(1) }).strict(),
    structural: ["nin"],
    inputs: [...portVector("u", 1, type), port("index", "Integer")],
    outputs: [port("y", type)],
    ports: ({ nin }) => ({ inputs: [...portVector("u", nin, type), port("index", "Integer")], outputs: [port("y", type)] }),
    evaluate: ({ inputs, params }) => ({ y: element(inputs, num(inputs, "index"), params.nin) }),
  });
}

function extractSignal({ name, type }: Family): BlockType {
  return defineBlock({
    type: `Routing.${name}ExtractSignal`,
    description: "y = u[extract], extract clamped to [1, nin]",
    parameters: z.object({ nin: width.default(1), extract: z.number().int().default(1) }).strict(),
    structural: ["nin"],
    inputs: portVector("u", 1, type),
    outputs: [port("y", type)],
    ports: ({ nin }) => ({ inputs: portVector("u", nin, type), outputs: [port("y", type)] }),
    evaluate: ({ inputs, params }) => ({ y: element(inputs, params.extract, params.nin) }),
  });
}

function scalarReplicator({ name, type }: Family): BlockType {
  return defineBlock({
    type: `Routing.${name}ScalarReplicator`,
    description: "y1 = ... = ynout = u",
    parameters: z.object({ nout: width.default(1) }).strict(),
    structural: ["nout"],
    inputs: [port("u", type)],
    outputs: portVector("y", 1, type),
    ports: ({ nout }) => ({ inputs: [port("u", type)], outputs: portVector("y", nout, type) }),
    evaluate: ({ inputs, params }) => {
      const u = inputs["u"];
      if (u === undefined) throw new DomainError("input 'u' is missing");
      const y: SignalMap = {};
      for (let i = 1; i <= params.nout; i += 1) y[`y${i}`] = u;
      return y;
    },
  });
}

function vectorReplicator({ name, type }: Family): BlockType {
  return defineBlock({
    type: `Routing.${name}VectorReplicator`,
    description: "Repeats u1..unin nrep times",
    parameters: z.object({ nin: width.default(1), nrep: width.default(1) }).strict(),
    structural: ["nin", "nrep"],
    inputs: portVector("u", 1, type),
    outputs: portVector("y", 1, type),
    ports: ({ nin, nrep }) => ({ inputs: portVector("u", nin, type), outputs: portVector("y", nin * nrep, type) }),
    evaluate: ({ inputs, params }) => {
      const y: SignalMap = {};
      for (let i = 0; i < params.nin * params.nrep; i += 1) y[`y${i + 1}`] = element(inputs, (i % params.nin) + 1, params.nin);
      return y;
    },
  });
}

export const routingBlocks: BlockType[] = families.flatMap((f) => [
  extractor(f),
  extractSignal(f),
  scalarReplicator(f),
  vectorReplicator(f),
]);

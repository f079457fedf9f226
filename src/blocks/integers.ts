import { z } from "zod";
import { defineBlock, defineStatefulBlock, type BlockType, type PortSpec } from "../block.js";
import { bool, num, numVector, phaseOf, port, portVector, width } from "./shared.js";

const noParams = z.object({}).strict();
const int = z.number().int();

const binary = [port("u1", "Integer"), port("u2", "Integer")];
const unary = [port("u", "Integer")];
const out = [port("y", "Integer")];
const flag = [port("y", "Boolean")];

function arithmetic(name: string, symbol: string, f: (a: number, b: number) => number): BlockType {
  return defineBlock({
    type: `Integers.${name}`,
    description: `y = u1 ${symbol} u2`,
    parameters: noParams,
    inputs: binary,
    outputs: out,
    evaluate: ({ inputs }) => ({ y: f(num(inputs, "u1"), num(inputs, "u2")) }),
  });
}

function compare(name: string, f: (a: number, b: number) => boolean): BlockType {
  return defineBlock({
    type: `Integers.${name}`,
    description: `y = ${name.toLowerCase()}(u1, u2)`,
    parameters: noParams,
    inputs: binary,
    outputs: flag,
    evaluate: ({ inputs }) => ({ y: f(num(inputs, "u1"), num(inputs, "u2")) }),
  });
}

function threshold(name: string, f: (u: number, t: number) => boolean): BlockType {
  return defineBlock({
    type: `Integers.${name}`,
    description: `y = ${name.toLowerCase()}(u, t)`,
    parameters: z.object({ t: int.default(0) }).strict(),
    inputs: unary,
    outputs: flag,
    evaluate: ({ inputs, params }) => ({ y: f(num(inputs, "u"), params.t) }),
  });
}

const changeOutputs: PortSpec[] = [port("y", "Boolean"), port("up", "Boolean"), port("down", "Boolean")];

export const integerBlocks: BlockType[] = [
  arithmetic("Add", "+", (a, b) => a + b),
  arithmetic("Subtract", "-", (a, b) => a - b),
  arithmetic("Multiply", "*", (a, b) => a * b),
  arithmetic("Max", "max", Math.max),
  arithmetic("Min", "min", Math.min),
  compare("Equal", (a, b) => a === b),
  compare("GreaterEqual", (a, b) => a >= b),
  compare("Less", (a, b) => a < b),
  threshold("GreaterEqualThreshold", (u, t) => u >= t),
  threshold("LessThreshold", (u, t) => u < t),
  defineBlock({
    type: "Integers.Abs",
    description: "y = |u|",
    parameters: noParams,
    inputs: unary,
    outputs: out,
    evaluate: ({ inputs }) => ({ y: Math.abs(num(inputs, "u")) }),
  }),
  defineBlock({
    type: "Integers.AddParameter",
    description: "y = u + p",
    parameters: z.object({ p: int.default(0) }).strict(),
    inputs: unary,
    outputs: out,
    evaluate: ({ inputs, params }) => ({ y: num(inputs, "u") + params.p }),
  }),
  defineBlock({
    type: "Integers.MultiSum",
    description: "y = u1 + u2 + ... + un",
    parameters: z.object({ nin: width.default(2) }).strict(),
    structural: ["nin"],
    inputs: portVector("u", 2, "Integer"),
    outputs: out,
    ports: ({ nin }) => ({ inputs: portVector("u", nin, "Integer"), outputs: out }),
    evaluate: ({ inputs, params }) => ({ y: numVector(inputs, "u", params.nin).reduce((a, b) => a + b, 0) }),
  }),
  defineStatefulBlock({
    type: "Integers.Change",
    description: "Flags a change of u since the previous step, and its direction",
    parameters: z.object({ pre_u_start: int.default(0) }).strict(),
    inputs: unary,
    outputs: changeOutputs,
    state: z.object({ u: z.number() }),
    initial: (p) => ({ u: p.pre_u_start }),
    evaluate: ({ inputs, state }) => {
      const u = num(inputs, "u");
      return { outputs: { y: u !== state.u, up: u > state.u, down: u < state.u }, next: { u } };
    },
  }),
  defineStatefulBlock({
    type: "Integers.OnCounter",
    description: "Counts rising edges of trigger; reset holds it at y_start",
    parameters: z.object({ y_start: int.default(0) }).strict(),
    inputs: [port("trigger", "Boolean"), port("reset", "Boolean", { default: false })],
    outputs: out,
    state: z.object({ y: z.number(), trigger: z.boolean() }),
    initial: (p) => ({ y: p.y_start, trigger: false }),
    evaluate: ({ inputs, params, state }) => {
      const trigger = bool(inputs, "trigger");
      let y = state.y;
      if (bool(inputs, "reset")) y = params.y_start;
      else if (trigger && !state.trigger) y += 1;
      return { outputs: { y }, next: { y, trigger } };
    },
  }),
  defineBlock({
    type: "Integers.Sources.Constant",
    description: "y = k",
    parameters: z.object({ k: int }).strict(),
    inputs: [],
    outputs: out,
    evaluate: ({ params }) => ({ y: params.k }),
  }),
  defineBlock({
    type: "Integers.Sources.Pulse",
    description: "offset + amplitude for the first width*period of every period after shift",
    parameters: z
      .object({
        amplitude: int.default(1),
        width: z.number().positive().max(1).default(0.5),
        period: z.number().positive().default(1),
        shift: z.number().finite().default(0),
        offset: int.default(0),
      })
      .strict(),
    inputs: [],
    outputs: out,
    evaluate: ({ params, ctx }) => {
      const phase = phaseOf(ctx.time, params.period, params.shift);
      const high = phase !== undefined && phase < params.width * params.period;
      return { y: high ? params.offset + params.amplitude : params.offset };
    },
  }),
];

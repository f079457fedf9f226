import { z } from "zod";
import { defineBlock, defineStatefulBlock, type BlockType } from "../block.js";
import { bool, boolVector, num, phaseOf, port, portVector, width } from "./shared.js";

const noParams = z.object({}).strict();
const binary = [port("u1", "Boolean"), port("u2", "Boolean")];
const out = [port("y", "Boolean")];
const real = z.number().finite();

function gate(name: string, description: string, f: (a: boolean, b: boolean) => boolean): BlockType {
  return defineBlock({
    type: `Logical.${name}`,
    description,
    parameters: noParams,
    inputs: binary,
    outputs: out,
    evaluate: ({ inputs }) => ({ y: f(bool(inputs, "u1"), bool(inputs, "u2")) }),
  });
}

function multi(name: string, description: string, f: (us: boolean[]) => boolean): BlockType {
  return defineBlock({
    type: `Logical.${name}`,
    description,
    parameters: z.object({ nin: width.default(2) }).strict(),
    structural: ["nin"],
    inputs: portVector("u", 2, "Boolean"),
    outputs: out,
    ports: ({ nin }) => ({ inputs: portVector("u", nin, "Boolean"), outputs: out }),
    evaluate: ({ inputs, params }) => ({ y: f(boolVector(inputs, "u", params.nin)) }),
  });
}

/** Latch and Toggle: `clr` wins; otherwise `set` acts on a rising edge of u. */
function latching(name: string, description: string, set: (y: boolean) => boolean): BlockType {
  return defineStatefulBlock({
    type: `Logical.${name}`,
    description,
    parameters: noParams,
    inputs: [port("u", "Boolean"), port("clr", "Boolean", { default: false })],
    outputs: out,
    state: z.object({ y: z.boolean(), u: z.boolean() }),
    initial: () => ({ y: false, u: false }),
    evaluate: ({ inputs, state }) => {
      const u = bool(inputs, "u");
      let y = state.y;
      if (bool(inputs, "clr")) y = false;
      else if (u && !state.u) y = set(y);
      return { outputs: { y }, next: { y, u } };
    },
  });
}

const timerOutputs = [port("y"), port("passed", "Boolean")];

export const logicalBlocks: BlockType[] = [
  defineBlock({
    type: "Logical.And",
    description: "y = u1 and u2",
    parameters: noParams,
    inputs: binary,
    outputs: out,
    evaluate: ({ inputs }) => ({ y: bool(inputs, "u1") && bool(inputs, "u2") }),
  }),
  defineBlock({
    type: "Logical.Or",
    description: "y = u1 or u2",
    parameters: noParams,
    inputs: binary,
    outputs: out,
    evaluate: ({ inputs }) => ({ y: bool(inputs, "u1") || bool(inputs, "u2") }),
  }),
  defineBlock({
    type: "Logical.Not",
    description: "y = not u",
    parameters: noParams,
    inputs: [port("u", "Boolean")],
    outputs: out,
    evaluate: ({ inputs }) => ({ y: !bool(inputs, "u") }),
  }),
  defineStatefulBlock({
    type: "Logical.Pre",
    description: "Outputs the input of the previous step",
    parameters: z.object({ pre_u_start: z.boolean().default(false) }).strict(),
    inputs: [port("u", "Boolean")],
    outputs: out,
    state: z.object({ u: z.boolean() }),
    initial: (p) => ({ u: p.pre_u_start }),
    evaluate: ({ inputs, state }) => ({ outputs: { y: state.u }, next: { u: bool(inputs, "u") } }),
  }),
  defineStatefulBlock({
    type: "Logical.Edge",
    description: "True on the step where u rises from false to true",
    parameters: z.object({ pre_u_start: z.boolean().default(false) }).strict(),
    inputs: [port("u", "Boolean")],
    outputs: out,
    state: z.object({ u: z.boolean() }),
    initial: (p) => ({ u: p.pre_u_start }),
    evaluate: ({ inputs, state }) => {
      const u = bool(inputs, "u");
      return { outputs: { y: u && !state.u }, next: { u } };
    },
  }),
  gate("Nand", "y = not (u1 and u2)", (a, b) => !(a && b)),
  gate("Nor", "y = not (u1 or u2)", (a, b) => !(a || b)),
  gate("Xor", "y = u1 xor u2", (a, b) => a !== b),
  multi("MultiAnd", "y = u1 and ... and un", (us) => us.every(Boolean)),
  multi("MultiOr", "y = u1 or ... or un", (us) => us.some(Boolean)),
  defineBlock({
    type: "Logical.Switch",
    description: "y = u1 if u2 else u3",
    parameters: noParams,
    inputs: [port("u1", "Boolean"), port("u2", "Boolean"), port("u3", "Boolean")],
    outputs: out,
    evaluate: ({ inputs }) => ({ y: bool(inputs, "u2") ? bool(inputs, "u1") : bool(inputs, "u3") }),
  }),
  defineStatefulBlock({
    type: "Logical.Change",
    description: "True on the step where u differs from the previous step",
    parameters: z.object({ pre_u_start: z.boolean().default(false) }).strict(),
    inputs: [port("u", "Boolean")],
    outputs: out,
    state: z.object({ u: z.boolean() }),
    initial: (p) => ({ u: p.pre_u_start }),
    evaluate: ({ inputs, state }) => {
      const u = bool(inputs, "u");
      return { outputs: { y: u !== state.u }, next: { u } };
    },
  }),
  defineStatefulBlock({
    type: "Logical.FallingEdge",
    description: "True on the step where u falls from true to false",
    parameters: z.object({ pre_u_start: z.boolean().default(false) }).strict(),
    inputs: [port("u", "Boolean")],
    outputs: out,
    state: z.object({ u: z.boolean() }),
    initial: (p) => ({ u: p.pre_u_start }),
    evaluate: ({ inputs, state }) => {
      const u = bool(inputs, "u");
      return { outputs: { y: state.u && !u }, next: { u } };
    },
  }),
  latching("Latch", "Set on a rising edge of u, cleared while clr is true", () => true),
  latching("Toggle", "Flips on each rising edge of u, cleared while clr is true", (y) => !y),
  defineStatefulBlock({
    type: "Logical.Timer",
    description: "Time u has been true; passed once it reaches t",
    parameters: z.object({ t: real.nonnegative().default(0) }).strict(),
    inputs: [port("u", "Boolean")],
    outputs: timerOutputs,
    state: z.object({ since: z.number().nullable() }),
    initial: () => ({ since: null }),
    evaluate: ({ inputs, params, state, ctx }) => {
      if (!bool(inputs, "u")) return { outputs: { y: 0, passed: false }, next: { since: null } };
      const since = state.since ?? ctx.time;
      const y = ctx.time - since;
      return { outputs: { y, passed: y >= params.t }, next: { since } };
    },
  }),
  defineStatefulBlock({
    type: "Logical.TimerAccumulating",
    description: "Total time u has been true since the last reset; passed once it reaches t",
    parameters: z.object({ t: real.nonnegative().default(0) }).strict(),
    inputs: [port("u", "Boolean"), port("reset", "Boolean", { default: false })],
    outputs: timerOutputs,
    state: z.object({ total: z.number(), since: z.number().nullable(), passed: z.boolean() }),
    initial: (p) => ({ total: 0, since: null, passed: p.t <= 0 }),
    evaluate: ({ inputs, params, state, ctx }) => {
      if (bool(inputs, "reset")) {
        const next = { total: 0, since: null, passed: params.t <= 0 };
        return { outputs: { y: 0, passed: next.passed }, next };
      }
      if (!bool(inputs, "u")) {
        const next = { ...state, since: null };
        return { outputs: { y: state.total, passed: state.passed }, next };
      }
      const total = state.total + (state.since === null ? 0 : ctx.time - state.since);
      const passed = state.passed || total >= params.t;
      return { outputs: { y: total, passed }, next: { total, since: ctx.time, passed } };
    },
  }),
  defineStatefulBlock({
    type: "Logical.TrueDelay",
    description: "Passes a rising edge of u after delayTime; a false u passes at once",
    parameters: z.object({ delayTime: real.nonnegative().default(0) }).strict(),
    inputs: [port("u", "Boolean")],
    outputs: out,
    state: z.object({ u: z.boolean(), at: z.number().nullable() }),
    initial: () => ({ u: false, at: null }),
    evaluate: ({ inputs, params, state, ctx }) => {
      const u = bool(inputs, "u");
      const rising = u && !state.u;
      let y = false;
      let at: number | null = null;
      if (rising && params.delayTime > 0) {
        at = ctx.time + params.delayTime;
      } else if (u && !rising && state.at !== null) {
        y = ctx.time >= state.at;
        if (!y) at = state.at;
      } else {
        y = u;
      }
      return { outputs: { y }, next: { u, at } };
    },
  }),
  defineStatefulBlock({
    type: "Logical.TrueFalseHold",
    description: "Follows u, but holds each value for at least its hold duration",
    parameters: z
      .object({ trueHoldDuration: real.nonnegative().default(0), falseHoldDuration: real.nonnegative().optional() })
      .strict(),
    inputs: [port("u", "Boolean")],
    outputs: out,
    state: z.object({ y: z.boolean(), since: z.number().nullable() }),
    initial: () => ({ y: false, since: null }),
    evaluate: ({ inputs, params, state, ctx }) => {
      const u = bool(inputs, "u");
      if (state.since === null) return { outputs: { y: u }, next: { y: u, since: ctx.time } };
      const held = ctx.time - state.since;
      const hold = state.y ? params.trueHoldDuration : (params.falseHoldDuration ?? params.trueHoldDuration);
      if (u !== state.y && held >= hold) return { outputs: { y: u }, next: { y: u, since: ctx.time } };
      return { outputs: { y: state.y }, next: state };
    },
  }),
  defineStatefulBlock({
    type: "Logical.VariablePulse",
    description: "Every period, starts a pulse lasting u seconds (clamped to [0, period])",
    parameters: z.object({ period: real.positive() }).strict(),
    inputs: [port("u")],
    outputs: out,
    state: z.object({ active: z.boolean(), end: z.number(), due: z.number() }),
    initial: (p) => ({ active: false, end: 0, due: p.period }),
    evaluate: ({ inputs, params, state, ctx }) => {
      let next = { ...state, active: state.active && ctx.time < state.end };
      if (ctx.time >= state.due) {
        let due = state.due;
        while (due <= ctx.time) due += params.period;
        const len = Math.max(0, Math.min(num(inputs, "u"), params.period));
        next = { active: true, end: ctx.time + len, due };
      }
      return { outputs: { y: next.active }, next };
    },
  }),
  defineBlock({
    type: "Logical.Sources.Constant",
    description: "y = k",
    parameters: z.object({ k: z.boolean().default(false) }).strict(),
    inputs: [],
    outputs: out,
    evaluate: ({ params }) => ({ y: params.k }),
  }),
  defineBlock({
    type: "Logical.Sources.Pulse",
    description: "True for the first width*period of every period after shift",
    parameters: z
      .object({ width: real.positive().max(1).default(0.5), period: real.positive().default(1), shift: real.default(0) })
      .strict(),
    inputs: [],
    outputs: out,
    evaluate: ({ params, ctx }) => {
      const phase = phaseOf(ctx.time, params.period, params.shift);
      return { y: phase !== undefined && phase < params.width * params.period };
    },
  }),
  defineBlock({
    type: "Logical.Sources.SampleTrigger",
    description: "True at the instants shift + k*period",
    parameters: z.object({ period: real.positive().default(1), shift: real.default(0) }).strict(),
    inputs: [],
    outputs: out,
    evaluate: ({ params, ctx }) => {
      const phase = phaseOf(ctx.time, params.period, params.shift);
      const eps = 1e-9;
      return { y: phase !== undefined && (phase < eps || params.period - phase < eps) };
    },
  }),
];

import { z } from "zod";
import { defineBlock, defineStatefulBlock, type BlockType } from "../block.js";
import { DomainError } from "../errors.js";
import { bool, num, numVector, phaseOf, port, portVector, width } from "./shared.js";

const noParams = z.object({}).strict();
const real = z.number().finite();

const binary = [port("u1"), port("u2")];
const unary = [port("u")];
const out = [port("y")];

function math(name: string, f: (u: number) => number, domain?: (u: number) => boolean): BlockType {
  return defineBlock({
    type: `Reals.${name}`,
    description: `y = ${name.toLowerCase()}(u)`,
    parameters: noParams,
    inputs: unary,
    outputs: out,
    evaluate: ({ inputs }) => {
      const u = num(inputs, "u");
      if (domain && !domain(u)) throw new DomainError(`${name.toLowerCase()} is undefined for ${u}`);
      return { y: f(u) };
    },
  });
}

function variadic(name: string, description: string, f: (us: number[]) => number): BlockType {
  return defineBlock({
    type: `Reals.${name}`,
    description,
    parameters: z.object({ nin: width.default(2) }).strict(),
    structural: ["nin"],
    inputs: portVector("u", 2),
    outputs: out,
    ports: ({ nin }) => ({ inputs: portVector("u", nin), outputs: out }),
    evaluate: ({ inputs, params }) => ({ y: f(numVector(inputs, "u", params.nin)) }),
  });
}

/** Round half away from zero at `n` decimals. */
function roundTo(u: number, n: number): number {
  const fac = 10 ** n;
  return u > 0 ? Math.floor(u * fac + 0.5) / fac : Math.ceil(u * fac - 0.5) / fac;
}

const hysteresisWidth = real.nonnegative().default(0);

export const realBlocks: BlockType[] = [
  defineBlock({
    type: "Reals.Add",
    description: "y = k1*u1 + k2*u2",
    parameters: z.object({ k1: real.default(1), k2: real.default(1) }).strict(),
    inputs: binary,
    outputs: out,
    evaluate: ({ inputs, params }) => ({ y: params.k1 * num(inputs, "u1") + params.k2 * num(inputs, "u2") }),
  }),
  defineBlock({
    type: "Reals.Subtract",
    description: "y = u1 - u2",
    parameters: noParams,
    inputs: binary,
    outputs: out,
    evaluate: ({ inputs }) => ({ y: num(inputs, "u1") - num(inputs, "u2") }),
  }),
  defineBlock({
    type: "Reals.Multiply",
    description: "y = u1 * u2",
    parameters: noParams,
    inputs: binary,
    outputs: out,
    evaluate: ({ inputs }) => ({ y: num(inputs, "u1") * num(inputs, "u2") }),
  }),
  defineBlock({
    type: "Reals.Divide",
    description: "y = u1 / u2",
    parameters: noParams,
    inputs: binary,
    outputs: out,
    evaluate: ({ inputs }) => {
      const d = num(inputs, "u2");
      if (d === 0) throw new DomainError("division by zero");
      return { y: num(inputs, "u1") / d };
    },
  }),
  defineBlock({
    type: "Reals.MultiplyByParameter",
    description: "y = k * u",
    parameters: z.object({ k: real }).strict(),
    inputs: unary,
    outputs: out,
    evaluate: ({ inputs, params }) => ({ y: params.k * num(inputs, "u") }),
  }),
  defineBlock({
    type: "Reals.AddParameter",
    description: "y = u + p",
    parameters: z.object({ p: real }).strict(),
    inputs: unary,
    outputs: out,
    evaluate: ({ inputs, params }) => ({ y: num(inputs, "u") + params.p }),
  }),
  defineBlock({
    type: "Reals.Abs",
    description: "y = |u|",
    parameters: noParams,
    inputs: unary,
    outputs: out,
    evaluate: ({ inputs }) => ({ y: Math.abs(num(inputs, "u")) }),
  }),
  defineBlock({
    type: "Reals.Sqrt",
    description: "y = sqrt(u)",
    parameters: noParams,
    inputs: unary,
    outputs: out,
    evaluate: ({ inputs }) => {
      const u = num(inputs, "u");
      if (u < 0) throw new DomainError(`square root of negative value ${u}`);
      return { y: Math.sqrt(u) };
    },
  }),
  defineBlock({
    type: "Reals.Min",
    description: "y = min(u1, u2)",
    parameters: noParams,
    inputs: binary,
    outputs: out,
    evaluate: ({ inputs }) => ({ y: Math.min(num(inputs, "u1"), num(inputs, "u2")) }),
  }),
  defineBlock({
    type: "Reals.Max",
    description: "y = max(u1, u2)",
    parameters: noParams,
    inputs: binary,
    outputs: out,
    evaluate: ({ inputs }) => ({ y: Math.max(num(inputs, "u1"), num(inputs, "u2")) }),
  }),
  defineBlock({
    type: "Reals.Limiter",
    description: "Clamps u to [uMin, uMax]",
    parameters: z
      .object({ uMax: real, uMin: real })
      .strict()
      .refine((p) => p.uMax > p.uMin, { message: "uMax must be greater than uMin", path: ["uMax"] }),
    inputs: unary,
    outputs: out,
    evaluate: ({ inputs, params }) => ({ y: Math.min(params.uMax, Math.max(params.uMin, num(inputs, "u"))) }),
  }),
  defineStatefulBlock({
    type: "Reals.Hysteresis",
    description: "Boolean output switching on above uHigh and off below uLow",
    parameters: z
      .object({ uLow: real, uHigh: real, pre_y_start: z.boolean().default(false) })
      .strict()
      .refine((p) => p.uHigh > p.uLow, { message: "uHigh must be greater than uLow", path: ["uHigh"] }),
    inputs: unary,
    outputs: [port("y", "Boolean")],
    state: z.object({ y: z.boolean() }),
    initial: (p) => ({ y: p.pre_y_start }),
    evaluate: ({ inputs, params, state }) => {
      const u = num(inputs, "u");
      const y = (!state.y && u > params.uHigh) || (state.y && u >= params.uLow);
      return { outputs: { y }, next: { y } };
    },
  }),
  // Forward Euler: the output is the pre-state, the increment lands at commit.
  defineStatefulBlock({
    type: "Reals.IntegratorWithReset",
    description: "Discrete integrator of k*u with reset on a rising trigger",
    parameters: z.object({ k: real.default(1), y_start: real.default(0) }).strict(),
    inputs: [port("u"), port("trigger", "Boolean", { default: false }), port("y_reset_in", "Real", { default: 0 })],
    outputs: out,
    state: z.object({ y: z.number(), trigger: z.boolean() }),
    initial: (p) => ({ y: p.y_start, trigger: false }),
    evaluate: ({ inputs, params, state, ctx }) => {
      const trigger = bool(inputs, "trigger");
      if (trigger && !state.trigger) {
        const y = num(inputs, "y_reset_in");
        return { outputs: { y }, next: { y, trigger } };
      }
      return {
        outputs: { y: state.y },
        next: { y: state.y + params.k * num(inputs, "u") * ctx.dt, trigger },
      };
    },
  }),
  defineBlock({
    type: "Reals.Sources.Constant",
    description: "y = k",
    parameters: z.object({ k: real }).strict(),
    inputs: [],
    outputs: out,
    evaluate: ({ params }) => ({ y: params.k }),
  }),
  defineBlock({
    type: "Reals.Sources.Ramp",
    description: "Ramp of the given height over duration, starting at startTime",
    parameters: z
      .object({ height: real.default(1), duration: real.positive(), offset: real.default(0), startTime: real.default(0) })
      .strict(),
    inputs: [],
    outputs: out,
    evaluate: ({ params, ctx }) => {
      const { height, duration, offset, startTime } = params;
      if (ctx.time < startTime) return { y: offset };
      if (ctx.time >= startTime + duration) return { y: offset + height };
      return { y: offset + (height * (ctx.time - startTime)) / duration };
    },
  }),
  math("Sin", Math.sin),
  math("Cos", Math.cos),
  math("Tan", Math.tan),
  math("Asin", Math.asin, (u) => Math.abs(u) <= 1),
  math("Acos", Math.acos, (u) => Math.abs(u) <= 1),
  math("Atan", Math.atan),
  math("Exp", Math.exp),
  math("Log", Math.log, (u) => u > 0),
  math("Log10", Math.log10, (u) => u > 0),
  defineBlock({
    type: "Reals.Atan2",
    description: "y = atan2(u1, u2)",
    parameters: noParams,
    inputs: binary,
    outputs: out,
    evaluate: ({ inputs }) => ({ y: Math.atan2(num(inputs, "u1"), num(inputs, "u2")) }),
  }),
  defineBlock({
    type: "Reals.Average",
    description: "y = (u1 + u2) / 2",
    parameters: noParams,
    inputs: binary,
    outputs: out,
    evaluate: ({ inputs }) => ({ y: 0.5 * (num(inputs, "u1") + num(inputs, "u2")) }),
  }),
  defineBlock({
    type: "Reals.Modulo",
    description: "y = u1 - floor(u1/u2)*u2",
    parameters: noParams,
    inputs: binary,
    outputs: out,
    evaluate: ({ inputs }) => {
      const u1 = num(inputs, "u1");
      const u2 = num(inputs, "u2");
      if (u2 === 0) throw new DomainError("modulo by zero");
      return { y: u1 - Math.floor(u1 / u2) * u2 };
    },
  }),
  defineBlock({
    type: "Reals.Round",
    description: "Rounds u to n digits after the decimal point",
    parameters: z.object({ n: z.number().int().default(0) }).strict(),
    inputs: unary,
    outputs: out,
    evaluate: ({ inputs, params }) => ({ y: roundTo(num(inputs, "u"), params.n) }),
  }),
  defineBlock({
    type: "Reals.Switch",
    description: "y = u1 if u2 else u3",
    parameters: noParams,
    inputs: [port("u1"), port("u2", "Boolean"), port("u3")],
    outputs: out,
    evaluate: ({ inputs }) => ({ y: bool(inputs, "u2") ? num(inputs, "u1") : num(inputs, "u3") }),
  }),
  defineBlock({
    type: "Reals.Line",
    description: "Line through (x1, f1) and (x2, f2), optionally limited to [x1, x2]",
    parameters: z.object({ limitBelow: z.boolean().default(true), limitAbove: z.boolean().default(true) }).strict(),
    inputs: [port("x1"), port("f1"), port("x2"), port("f2"), port("u")],
    outputs: out,
    evaluate: ({ inputs, params }) => {
      const x1 = num(inputs, "x1");
      const f1 = num(inputs, "f1");
      const x2 = num(inputs, "x2");
      const f2 = num(inputs, "f2");
      if (x2 === x1) return { y: f1 };
      let x = num(inputs, "u");
      if (params.limitBelow) x = Math.max(x1, x);
      if (params.limitAbove) x = Math.min(x2, x);
      return { y: f1 + ((f2 - f1) * (x - x1)) / (x2 - x1) };
    },
  }),
  variadic("MultiSum", "y = u1 + u2 + ... + un", (us) => us.reduce((a, b) => a + b, 0)),
  variadic("MultiMax", "y = max(u1, ..., un)", (us) => Math.max(...us)),
  variadic("MultiMin", "y = min(u1, ..., un)", (us) => Math.min(...us)),
  defineStatefulBlock({
    type: "Reals.Greater",
    description: "y = u1 > u2, holding true until u1 <= u2 - h",
    parameters: z.object({ h: hysteresisWidth, pre_y_start: z.boolean().default(false) }).strict(),
    inputs: binary,
    outputs: [port("y", "Boolean")],
    state: z.object({ y: z.boolean() }),
    initial: (p) => ({ y: p.pre_y_start }),
    evaluate: ({ inputs, params, state }) => {
      const u1 = num(inputs, "u1");
      const u2 = num(inputs, "u2");
      const y = state.y ? u1 > u2 - params.h : u1 > u2;
      return { outputs: { y }, next: { y } };
    },
  }),
  defineStatefulBlock({
    type: "Reals.LessThreshold",
    description: "y = u < t, holding true until u >= t + h",
    parameters: z.object({ t: real.default(0), h: hysteresisWidth, pre_y_start: z.boolean().default(false) }).strict(),
    inputs: unary,
    outputs: [port("y", "Boolean")],
    state: z.object({ y: z.boolean() }),
    initial: (p) => ({ y: p.pre_y_start }),
    evaluate: ({ inputs, params, state }) => {
      const u = num(inputs, "u");
      const y = state.y ? u < params.t + params.h : u < params.t;
      return { outputs: { y }, next: { y } };
    },
  }),
  // Backward difference against the previous sample.
  defineStatefulBlock({
    type: "Reals.Derivative",
    description: "Rate of change of u, limited to [-y_max, y_max]",
    parameters: z.object({ y_max: z.number().positive().default(Number.POSITIVE_INFINITY), y_start: real.default(0) }).strict(),
    inputs: unary,
    outputs: out,
    state: z.object({ u: z.number().nullable(), t: z.number().nullable(), y: z.number() }),
    initial: (p) => ({ u: null, t: null, y: p.y_start }),
    evaluate: ({ inputs, params, state, ctx }) => {
      const u = num(inputs, "u");
      let y = state.y;
      if (state.u !== null && state.t !== null && ctx.time > state.t) {
        const rate = (u - state.u) / (ctx.time - state.t);
        y = Math.max(-params.y_max, Math.min(params.y_max, rate));
      }
      return { outputs: { y }, next: { u, t: ctx.time, y } };
    },
  }),
  defineStatefulBlock({
    type: "Reals.LimitSlewRate",
    description: "Follows u with its rate of change limited",
    parameters: z
      .object({
        raisingSlewRate: z.number().positive().default(Number.POSITIVE_INFINITY),
        fallingSlewRate: z.number().positive().default(Number.POSITIVE_INFINITY),
        y_start: real.default(0),
      })
      .strict(),
    inputs: unary,
    outputs: out,
    state: z.object({ y: z.number(), t: z.number().nullable() }),
    initial: (p) => ({ y: p.y_start, t: null }),
    evaluate: ({ inputs, params, state, ctx }) => {
      const u = num(inputs, "u");
      const dt = state.t === null ? ctx.dt : ctx.time - state.t;
      let y = state.y;
      if (dt > 0) {
        const delta = u - y;
        y += delta > 0 ? Math.min(delta, params.raisingSlewRate * dt) : Math.max(delta, -params.fallingSlewRate * dt);
      }
      return { outputs: { y }, next: { y, t: ctx.time } };
    },
  }),
  defineStatefulBlock({
    type: "Reals.MovingAverage",
    description: "Mean of the samples taken over the last delta seconds",
    parameters: z.object({ delta: real.positive() }).strict(),
    inputs: unary,
    outputs: out,
    state: z.object({ window: z.array(z.object({ t: z.number(), u: z.number() })) }),
    initial: () => ({ window: [] }),
    evaluate: ({ inputs, params, state, ctx }) => {
      const window = [...state.window, { t: ctx.time, u: num(inputs, "u") }].filter((s) => s.t >= ctx.time - params.delta);
      const y = window.reduce((a, s) => a + s.u, 0) / window.length;
      return { outputs: { y }, next: { window } };
    },
  }),
  defineBlock({
    type: "Reals.Sources.Pulse",
    description: "offset + amplitude for the first width*period of every period after shift",
    parameters: z
      .object({
        amplitude: real.default(1),
        width: real.positive().max(1).default(0.5),
        period: real.positive().default(1),
        shift: real.default(0),
        offset: real.default(0),
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
  defineBlock({
    type: "Reals.Sources.Sin",
    description: "offset + amplitude*sin(2*pi*freqHz*(time - startTime) + phase)",
    parameters: z
      .object({
        amplitude: real.default(1),
        freqHz: real.positive().default(1),
        phase: real.default(0),
        offset: real.default(0),
        startTime: real.default(0),
      })
      .strict(),
    inputs: [],
    outputs: out,
    evaluate: ({ params, ctx }) => {
      if (ctx.time < params.startTime) return { y: params.offset };
      const arg = 2 * Math.PI * params.freqHz * (ctx.time - params.startTime) + params.phase;
      return { y: params.offset + params.amplitude * Math.sin(arg) };
    },
  }),
  defineBlock({
    type: "Reals.Sources.CivilTime",
    description: "y = current time",
    parameters: noParams,
    inputs: [],
    outputs: out,
    evaluate: ({ ctx }) => ({ y: ctx.time }),
  }),
];

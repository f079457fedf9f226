import { z } from "zod";
import { defineStatefulBlock, type BlockType } from "../block.js";
import { bool, num, port } from "./shared.js";

const real = z.number().finite();

const sampled = z
  .object({ samplePeriod: real.positive(), startTime: real.default(0) })
  .strict();

const triggered = [port("u"), port("trigger", "Boolean")];

/** Next sample instant strictly after `time`, on the grid startTime + k*period. */
function nextSample(due: number, time: number, period: number): number {
  let next = due;
  while (next <= time) next += period;
  return next;
}

export const discreteBlocks: BlockType[] = [
  defineStatefulBlock({
    type: "Discrete.UnitDelay",
    description: "Outputs the input of the previous step (z^-1)",
    parameters: z.object({ y_start: real.default(0) }).strict(),
    inputs: [port("u")],
    outputs: [port("y")],
    state: z.object({ u: z.number() }),
    initial: (p) => ({ u: p.y_start }),
    evaluate: ({ inputs, state }) => ({ outputs: { y: state.u }, next: { u: num(inputs, "u") } }),
  }),
  defineStatefulBlock({
    type: "Discrete.Sampler",
    description: "Samples u every samplePeriod from startTime; the first step always samples",
    parameters: sampled,
    inputs: [port("u")],
    outputs: [port("y")],
    state: z.object({ y: z.number(), due: z.number(), sampled: z.boolean() }),
    initial: (p) => ({ y: 0, due: p.startTime, sampled: false }),
    evaluate: ({ inputs, params, state, ctx }) => {
      const u = num(inputs, "u");
      const hit = ctx.time >= state.due;
      const y = hit || !state.sampled ? u : state.y;
      const due = hit ? nextSample(state.due, ctx.time, params.samplePeriod) : state.due;
      return { outputs: { y }, next: { y, due, sampled: true } };
    },
  }),
  defineStatefulBlock({
    type: "Discrete.ZeroOrderHold",
    description: "Holds the sample of u taken every samplePeriod; passes u through before the first sample",
    parameters: sampled,
    inputs: [port("u")],
    outputs: [port("y")],
    state: z.object({ held: z.number().nullable(), due: z.number() }),
    initial: (p) => ({ held: null, due: p.startTime }),
    evaluate: ({ inputs, params, state, ctx }) => {
      const u = num(inputs, "u");
      if (ctx.time < state.due) return { outputs: { y: state.held ?? u }, next: state };
      return { outputs: { y: u }, next: { held: u, due: nextSample(state.due, ctx.time, params.samplePeriod) } };
    },
  }),
  defineStatefulBlock({
    type: "Discrete.FirstOrderHold",
    description: "Extrapolates linearly from the last two samples of u",
    parameters: sampled,
    inputs: [port("u")],
    outputs: [port("y")],
    state: z.object({
      current: z.number().nullable(),
      previous: z.number().nullable(),
      sampledAt: z.number(),
      due: z.number(),
    }),
    initial: (p) => ({ current: null, previous: null, sampledAt: p.startTime, due: p.startTime }),
    evaluate: ({ inputs, params, state, ctx }) => {
      const u = num(inputs, "u");
      let next = state;
      if (ctx.time >= state.due) {
        next = {
          current: u,
          previous: state.current,
          sampledAt: ctx.time,
          due: nextSample(state.due, ctx.time, params.samplePeriod),
        };
      }
      if (next.current === null) return { outputs: { y: u }, next };
      if (next.previous === null) return { outputs: { y: next.current }, next };
      const slope = (next.current - next.previous) / params.samplePeriod;
      return { outputs: { y: next.current + slope * (ctx.time - next.sampledAt) }, next };
    },
  }),
  defineStatefulBlock({
    type: "Discrete.TriggeredSampler",
    description: "Samples u on each rising edge of trigger",
    parameters: z.object({ y_start: real.default(0) }).strict(),
    inputs: triggered,
    outputs: [port("y")],
    state: z.object({ y: z.number(), trigger: z.boolean() }),
    initial: (p) => ({ y: p.y_start, trigger: false }),
    evaluate: ({ inputs, state }) => {
      const trigger = bool(inputs, "trigger");
      const y = trigger && !state.trigger ? num(inputs, "u") : state.y;
      return { outputs: { y }, next: { y, trigger } };
    },
  }),
  defineStatefulBlock({
    type: "Discrete.TriggeredMax",
    description: "Largest u since the last rising edge of trigger",
    parameters: z.object({}).strict(),
    inputs: triggered,
    outputs: [port("y")],
    state: z.object({ y: z.number().nullable(), trigger: z.boolean() }),
    initial: () => ({ y: null, trigger: false }),
    evaluate: ({ inputs, state }) => {
      const u = num(inputs, "u");
      const trigger = bool(inputs, "trigger");
      const y = state.y === null || (trigger && !state.trigger) ? u : Math.max(state.y, u);
      return { outputs: { y }, next: { y, trigger } };
    },
  }),
  defineStatefulBlock({
    type: "Discrete.TriggeredMovingMean",
    description: "Mean of u since the last rising edge of trigger",
    parameters: z.object({}).strict(),
    inputs: triggered,
    outputs: [port("y")],
    state: z.object({ sum: z.number(), count: z.number().int(), trigger: z.boolean() }),
    initial: () => ({ sum: 0, count: 0, trigger: false }),
    evaluate: ({ inputs, state }) => {
      const u = num(inputs, "u");
      const trigger = bool(inputs, "trigger");
      const restart = trigger && !state.trigger;
      const sum = restart ? u : state.sum + u;
      const count = restart ? 1 : state.count + 1;
      return { outputs: { y: sum / count }, next: { sum, count, trigger } };
    },
  }),
];

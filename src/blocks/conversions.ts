import { z } from "zod";
import { defineBlock, type BlockType } from "../block.js";
import { DomainError } from "../errors.js";
import { bool, num, port } from "./shared.js";

const real = z.number().finite();

export const conversionBlocks: BlockType[] = [
  defineBlock({
    type: "Conversions.BooleanToReal",
    description: "y = realTrue if u else realFalse",
    parameters: z.object({ realTrue: real.default(1), realFalse: real.default(0) }).strict(),
    inputs: [port("u", "Boolean")],
    outputs: [port("y")],
    evaluate: ({ inputs, params }) => ({ y: bool(inputs, "u") ? params.realTrue : params.realFalse }),
  }),
  defineBlock({
    type: "Conversions.BooleanToInteger",
    description: "y = integerTrue if u else integerFalse",
    parameters: z.object({ integerTrue: z.number().int().default(1), integerFalse: z.number().int().default(0) }).strict(),
    inputs: [port("u", "Boolean")],
    outputs: [port("y", "Integer")],
    evaluate: ({ inputs, params }) => ({ y: bool(inputs, "u") ? params.integerTrue : params.integerFalse }),
  }),
  defineBlock({
    type: "Conversions.IntegerToReal",
    description: "y = u",
    parameters: z.object({}).strict(),
    inputs: [port("u", "Integer")],
    outputs: [port("y")],
    evaluate: ({ inputs }) => ({ y: num(inputs, "u") }),
  }),
  defineBlock({
    type: "Conversions.RealToInteger",
    description: "Rounds u to the nearest integer, halves away from zero",
    parameters: z.object({}).strict(),
    inputs: [port("u")],
    outputs: [port("y", "Integer")],
    evaluate: ({ inputs }) => {
      const u = num(inputs, "u");
      if (!Number.isFinite(u)) throw new DomainError(`cannot convert ${u} to an integer`);
      return { y: u > 0 ? Math.floor(u + 0.5) : Math.ceil(u - 0.5) };
    },
  }),
];

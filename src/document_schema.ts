import { z } from "zod";

export const COMPOSITE_TYPE = "CompositeBlock";

export const signalTypeSchema = z.enum(["Real", "Integer", "Boolean"]);

const literal = z.union([z.number().finite(), z.boolean()]);

export const paramExprSchema = z.union([literal, z.object({ "@param": z.string().min(1) }).strict()]);

const portDecl = z.object({
  name: z.string().min(1),
  type: signalTypeSchema.default("Real"),
  description: z.string().optional(),
});

const parameterDecl = z.object({
  name: z.string().min(1),
  type: signalTypeSchema.default("Real"),
  value: literal,
  description: z.string().default(""),
});

export const instanceNodeSchema = z.object({
  "@id": z.string().min(1),
  "@type": z.string().min(1),
  parameters: z.record(paramExprSchema).default({}),
  description: z.string().optional(),
});

const connectionDecl = z.object({
  source: z.string().min(1),
  destinations: z.array(z.string().min(1)).min(1),
});

export const compositeNodeSchema = z.object({
  "@id": z.string().min(1),
  "@type": z.literal(COMPOSITE_TYPE),
  description: z.string().default(""),
  parameters: z.array(parameterDecl).default([]),
  inputs: z.array(portDecl).default([]),
  outputs: z.array(portDecl).default([]),
  instances: z.array(z.union([z.string().regex(/^#.+/, "expected '#<id>'"), instanceNodeSchema])).default([]),
  connections: z.array(connectionDecl).default([]),
});

export const documentSchema = z.object({
  "@context": z.unknown().optional(),
  "@graph": z.array(z.record(z.unknown())).min(1, "@graph must list at least one node"),
});

export type InstanceNode = z.infer<typeof instanceNodeSchema>;
export type CompositeNode = z.infer<typeof compositeNodeSchema>;

import fs from "fs";
import path from "path";
import yaml from "js-yaml";
import { z } from "zod";
import { DEFAULT_RUNTIME_MODULE } from "./codegen.js";
import { ConfigError } from "./errors.js";
import { errorMessage, readText } from "./util.js";

const configSchema = z
  .object({
    search_paths: z.array(z.string().min(1)).default([]),
    runtime_module: z.string().min(1).default(DEFAULT_RUNTIME_MODULE),
    time: z
      .object({
        mode: z.enum(["logical", "paced"]).default("logical"),
        step: z.number().finite().nonnegative().default(1),
        origin: z.number().finite().optional(),
      })
      .strict()
      .default({}),
    checkpoint: z
      .object({
        directory: z.string().min(1).optional(),
        interval_steps: z.number().int().nonnegative().default(0),
        keep: z.number().int().nonnegative().default(0),
      })
      .strict()
      .default({}),
  })
  .strict();

export type Config = z.infer<typeof configSchema>;

export function defaultConfig(): Config {
  return configSchema.parse({});
}

/**
 * Validates a decoded config. Relative paths are taken against `baseDir`,
 * the directory of the file the values came from.
 */
export function parseConfig(raw: unknown, baseDir: string, source = "<config>"): Config {
  const parsed = configSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`${source}: ${issue?.path.join(".") || "<root>"}: ${issue?.message ?? "invalid"}`);
  }
  const cfg = parsed.data;
  const dir = cfg.checkpoint.directory;
  return {
    ...cfg,
    search_paths: cfg.search_paths.map((p) => path.resolve(baseDir, p)),
    checkpoint: { ...cfg.checkpoint, directory: dir === undefined ? undefined : path.resolve(baseDir, dir) },
  };
}

export function loadConfig(file?: string): Config {
  if (!file) return defaultConfig();
  const abs = path.resolve(file);
  if (!fs.existsSync(abs)) throw new ConfigError(`config file not found: ${abs}`);
  let raw: unknown;
  try {
    raw = yaml.load(readText(abs));
  } catch (e) {
    throw new ConfigError(`${abs}: ${errorMessage(e)}`, { cause: e });
  }
  return parseConfig(raw, path.dirname(abs), abs);
}

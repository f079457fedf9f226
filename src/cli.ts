import path from "path";
import yaml from "js-yaml";
import yargs, { type Argv } from "yargs";
import { z } from "zod";
import type { SignalMap } from "./block.js";
import { defaultCatalog } from "./blocks/catalog.js";
import { AutoCheckpointer, CheckpointManager } from "./checkpoint.js";
import { loadConfig, type Config } from "./config.js";
import { NetworkRuntime } from "./engine.js";
import { CdlError, ConfigError } from "./errors.js";
import { createLogger } from "./log.js";
import { resolveFile } from "./resolve.js";
import { Simulation } from "./simulation.js";
import { createTimeSource, type Clock, type Sleep } from "./time_source.js";
import { translateFile } from "./translate.js";
import { errorMessage, isRecord, readText, writeText } from "./util.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export type CliIo = {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  clock?: Clock;
  sleep?: Sleep;
};

const defaultIo: CliIo = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

const signalMapSchema = z.record(z.union([z.number().finite(), z.boolean()]));

const planSchema = z
  .object({
    parameters: signalMapSchema.default({}),
    steps: z.array(signalMapSchema).min(1),
  })
  .strict();

type InputPlan = {
  parameters: SignalMap;
  sequence: SignalMap[];
};

function checked<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, file: string): T {
  const parsed = schema.safeParse(raw);
  if (parsed.success) return parsed.data;
  const issue = parsed.error.issues[0];
  throw new ConfigError(`${file}: ${issue?.path.join(".") || "<root>"}: ${issue?.message ?? "invalid inputs"}`);
}

/**
 * Inputs for `count` steps. The file holds a list of per-step maps, an object
 * with `parameters` and `steps`, or one map used for every step.
 */
export function loadInputPlan(file: string, count?: number): InputPlan {
  let raw: unknown;
  try {
    raw = yaml.load(readText(file));
  } catch (e) {
    throw new ConfigError(`cannot read inputs ${file}: ${errorMessage(e)}`, { cause: e });
  }
  if (count !== undefined && (!Number.isInteger(count) || count < 1)) {
    throw new ConfigError(`--steps must be a positive integer, got ${count}`);
  }

  let plan: InputPlan;
  if (Array.isArray(raw)) {
    plan = { parameters: {}, sequence: checked(z.array(signalMapSchema).min(1), raw, file) };
  } else if (isRecord(raw) && Array.isArray(raw["steps"])) {
    const data = checked(planSchema, raw, file);
    plan = { parameters: data.parameters, sequence: data.steps };
  } else {
    const single = checked(signalMapSchema, raw, file);
    return { parameters: {}, sequence: Array.from({ length: count ?? 1 }, () => ({ ...single })) };
  }
  if (count !== undefined && count > plan.sequence.length) {
    throw new ConfigError(`${file} lists ${plan.sequence.length} steps, ${count} requested`);
  }
  return { parameters: plan.parameters, sequence: plan.sequence.slice(0, count ?? plan.sequence.length) };
}

function searchPaths(cli: string[] | undefined, cfg: Config): string[] {
  return [...(cli ?? []), ...cfg.search_paths];
}

async function guard(io: CliIo, verbose: boolean, run: () => Promise<void> | void): Promise<number> {
  try {
    await run();
    return EXIT_OK;
  } catch (e) {
    const category = e instanceof CdlError ? e.category : "internal";
    io.stderr(`error[${category}]: ${errorMessage(e)}`);
    if (verbose && e instanceof Error && e.stack) io.stderr(e.stack);
    return EXIT_FAILURE;
  }
}

function common<T>(y: Argv<T>) {
  return y
    .option("search-path", { type: "string", array: true, describe: "Extra directory searched for composite documents" })
    .option("config", { type: "string", describe: "YAML configuration file" })
    .option("verbose", { alias: "v", type: "boolean", default: false, describe: "Print debug diagnostics" });
}

/** Runs one command line and resolves with its exit code; never calls process.exit. */
export async function runCli(argv: string[], io: CliIo = defaultIo): Promise<number> {
  let code = EXIT_OK;
  let usage: string | undefined;

  const parser = yargs(argv)
    .scriptName("cdlnet")
    .exitProcess(false)
    .strict()
    .version(false)
    .demandCommand(1, "a command is required")
    .fail((msg, err) => {
      usage = msg || errorMessage(err);
    })
    .command(
      "translate <input>",
      "Generate one TypeScript module per composite",
      (y) =>
        common(y)
          .positional("input", { type: "string", demandOption: true, describe: "Top-level document" })
          .option("output", { alias: "o", type: "string", demandOption: true, describe: "Output directory" })
          .option("runtime-module", { type: "string", describe: "Module the artifacts import the runtime from" }),
      async (args) => {
        code = await guard(io, args.verbose, () => {
          const cfg = loadConfig(args.config);
          const logger = createLogger("translate", { verbose: args.verbose, sink: io.stderr });
          const artifacts = translateFile(args.input, {
            outDir: args.output,
            searchPaths: searchPaths(args["search-path"], cfg),
            runtimeModule: args["runtime-module"] ?? cfg.runtime_module,
            logger,
          });
          for (const a of artifacts) io.stdout(path.join(args.output, a.fileName));
        });
      },
    )
    .command(
      "check <input>",
      "Parse, resolve and validate a document",
      (y) => common(y).positional("input", { type: "string", demandOption: true }),
      async (args) => {
        code = await guard(io, args.verbose, () => {
          const cfg = loadConfig(args.config);
          const logger = createLogger("check", { verbose: args.verbose, sink: io.stderr });
          const { root, networks } = resolveFile(args.input, { searchPaths: searchPaths(args["search-path"], cfg), logger });
          const order = root.evaluationOrder().map((i) => i.name);
          io.stdout(`${root.name}: ok networks=${networks.length} order=${order.join(",")}`);
        });
      },
    )
    .command(
      "simulate <input>",
      "Run a network for a number of steps",
      (y) =>
        common(y)
          .positional("input", { type: "string", demandOption: true })
          .option("inputs", { type: "string", demandOption: true, describe: "JSON or YAML input values" })
          .option("steps", { type: "number", describe: "Number of steps" })
          .option("step", { type: "number", describe: "Time increment per step" })
          .option("checkpoint-dir", { type: "string" })
          .option("checkpoint-every", { type: "number" })
          .option("restore", { type: "string", describe: "Checkpoint file to start from, or 'latest'" })
          .option("output", { alias: "o", type: "string", describe: "Write results here instead of stdout" }),
      async (args) => {
        code = await guard(io, args.verbose, async () => {
          const cfg = loadConfig(args.config);
          const logger = createLogger("simulate", { verbose: args.verbose, sink: io.stderr });
          const { root } = resolveFile(args.input, { searchPaths: searchPaths(args["search-path"], cfg), logger });
          const plan = loadInputPlan(args.inputs, args.steps);

          const time = createTimeSource(
            { mode: cfg.time.mode, step: args.step ?? cfg.time.step, origin: cfg.time.origin },
            { clock: io.clock, sleep: io.sleep },
          );
          const runtime = new NetworkRuntime(root, plan.parameters);

          const dir = args["checkpoint-dir"] ?? cfg.checkpoint.directory;
          const every = args["checkpoint-every"] ?? cfg.checkpoint.interval_steps;
          const manager = dir ? new CheckpointManager({ directory: dir, keep: cfg.checkpoint.keep, logger }) : undefined;
          if (every > 0 && !manager) throw new ConfigError("checkpointing every N steps needs a checkpoint directory");
          const sim = new Simulation(runtime, time, {
            autoCheckpoint: manager && every > 0 ? new AutoCheckpointer(manager, every) : undefined,
            logger,
          });

          if (args.restore) {
            if (args.restore === "latest") {
              if (!manager) throw new ConfigError("--restore latest needs a checkpoint directory");
              sim.resumeFrom(manager.restore(runtime, time));
            } else {
              const from = new CheckpointManager({ directory: path.dirname(args.restore), logger });
              sim.restore(from.load(args.restore));
            }
            logger.info(`restored steps=${sim.stepsCompleted} t=${time.now()}`);
          }

          const records = await sim.run(plan.sequence);
          const report = JSON.stringify({ network: root.name, steps: records }, null, 2);
          if (args.output) writeText(args.output, report + "\n");
          else io.stdout(report);
          logger.info(`steps=${records.length} t=${time.now()}`);
        });
      },
    )
    .command(
      "blocks",
      "List the elementary block catalogue",
      (y) => y,
      () => {
        for (const t of defaultCatalog.list()) io.stdout(t);
      },
    );

  await parser.parseAsync();
  if (usage !== undefined) {
    io.stderr(`usage: ${usage}`);
    io.stderr("run 'cdlnet --help' for the command list");
    return EXIT_USAGE;
  }
  return code;
}

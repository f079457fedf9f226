import fs from "fs";
import path from "path";
import { z } from "zod";
import type { Block, JsonValue, StateRecord } from "./block.js";
import { CheckpointFormatError, CheckpointMismatchError } from "./errors.js";
import { silentLogger, type Logger } from "./log.js";
import { timeSourceStateSchema, type TimeSource, type TimeSourceState } from "./time_source.js";
import { errorMessage, readText, writeText } from "./util.js";

export const CHECKPOINT_FORMAT_VERSION = 1;

const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValue), z.record(jsonValue)]),
);

const checkpointSchema = z.object({
  format_version: z.number().int(),
  timestamp: z.string(),
  time_source: timeSourceStateSchema,
  instances: z.record(z.record(jsonValue)),
  metadata: z.record(z.unknown()).default({}),
});

export type Checkpoint = {
  format_version: number;
  timestamp: string;
  time_source: TimeSourceState;
  instances: Record<string, StateRecord>;
  metadata: Record<string, unknown>;
};

/** The parts of a runtime a checkpoint touches. */
export type Checkpointable = Pick<Block, "stateSlots">;

export function createCheckpoint(
  network: Checkpointable,
  time: TimeSource,
  metadata: Record<string, unknown> = {},
  now: () => Date = () => new Date(),
): Checkpoint {
  const instances: Record<string, StateRecord> = {};
  for (const slot of network.stateSlots("")) instances[slot.id] = slot.read();
  return {
    format_version: CHECKPOINT_FORMAT_VERSION,
    timestamp: now().toISOString(),
    time_source: time.getState(),
    instances,
    metadata: { ...metadata },
  };
}

export function parseCheckpoint(raw: unknown): Checkpoint {
  if (typeof raw === "object" && raw !== null && "format_version" in raw) {
    const version = raw.format_version;
    if (version !== CHECKPOINT_FORMAT_VERSION) {
      throw new CheckpointFormatError(
        `unsupported checkpoint format_version ${String(version)} (expected ${CHECKPOINT_FORMAT_VERSION})`,
      );
    }
  }
  const parsed = checkpointSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new CheckpointFormatError(`malformed checkpoint at ${issue?.path.join(".") || "<root>"}: ${issue?.message ?? "invalid"}`);
  }
  return parsed.data;
}

/**
 * Installs a snapshot into a live network and time source. The identity sets
 * must match exactly and every record must parse before anything is written.
 */
export function restoreCheckpoint(snapshot: Checkpoint, network: Checkpointable, time: TimeSource): void {
  const slots = network.stateSlots("");
  const live = new Set(slots.map((s) => s.id));
  const recorded = new Set(Object.keys(snapshot.instances));
  const missing = [...live].filter((id) => !recorded.has(id)).sort();
  const extra = [...recorded].filter((id) => !live.has(id)).sort();
  if (missing.length > 0 || extra.length > 0) throw new CheckpointMismatchError(missing, extra);
  if (snapshot.time_source.mode !== time.mode) {
    throw new CheckpointMismatchError([], [`time source mode '${snapshot.time_source.mode}' (live source is '${time.mode}')`]);
  }

  const apply = slots.map((slot) => slot.prepare(snapshot.instances[slot.id]));
  time.setState(snapshot.time_source);
  for (const install of apply) install();
}

const FILE_PATTERN = /^checkpoint-(\d+)\.json$/;

export type CheckpointManagerOptions = {
  directory: string;
  /** Keep at most this many files; 0 keeps all. */
  keep?: number;
  now?: () => Date;
  logger?: Logger;
};

export class CheckpointManager {
  readonly directory: string;
  private readonly keep: number;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(opts: CheckpointManagerOptions) {
    this.directory = path.resolve(opts.directory);
    this.keep = Math.max(0, opts.keep ?? 0);
    this.now = opts.now ?? (() => new Date());
    this.logger = opts.logger ?? silentLogger;
  }

  /** Checkpoint files, oldest first. */
  list(): string[] {
    if (!fs.existsSync(this.directory)) return [];
    return fs
      .readdirSync(this.directory)
      .filter((f) => FILE_PATTERN.test(f))
      .sort()
      .map((f) => path.join(this.directory, f));
  }

  latest(): string | undefined {
    return this.list().at(-1);
  }

  private nextFile(): string {
    const last = this.latest();
    const m = last ? FILE_PATTERN.exec(path.basename(last)) : null;
    const seq = m ? Number(m[1]) + 1 : 1;
    return path.join(this.directory, `checkpoint-${String(seq).padStart(6, "0")}.json`);
  }

  save(network: Checkpointable, time: TimeSource, metadata: Record<string, unknown> = {}): string {
    const snapshot = createCheckpoint(network, time, metadata, this.now);
    const file = this.nextFile();
    writeText(file, JSON.stringify(snapshot, null, 2) + "\n");
    this.logger.debug(`saved ${file} instances=${Object.keys(snapshot.instances).length} t=${snapshot.time_source.instant}`);
    this.prune();
    return file;
  }

  load(file: string): Checkpoint {
    let raw: unknown;
    try {
      raw = JSON.parse(readText(file));
    } catch (e) {
      throw new CheckpointFormatError(`cannot read checkpoint ${file}: ${errorMessage(e)}`, {
        cause: e,
      });
    }
    return parseCheckpoint(raw);
  }

  /** Restores `file` (default: the latest) and returns its metadata. */
  restore(network: Checkpointable, time: TimeSource, file = this.latest()): Record<string, unknown> {
    if (!file) throw new CheckpointFormatError(`no checkpoints in ${this.directory}`);
    const snapshot = this.load(file);
    restoreCheckpoint(snapshot, network, time);
    this.logger.debug(`restored ${file} t=${snapshot.time_source.instant}`);
    return snapshot.metadata;
  }

  private prune(): void {
    if (this.keep === 0) return;
    const files = this.list();
    for (const f of files.slice(0, Math.max(0, files.length - this.keep))) {
      fs.rmSync(f);
      this.logger.debug(`pruned ${f}`);
    }
  }
}

/** Saves every `intervalSteps` completed steps. */
export class AutoCheckpointer {
  constructor(
    private readonly manager: CheckpointManager,
    readonly intervalSteps: number,
  ) {}

  maybeCheckpoint(
    network: Checkpointable,
    time: TimeSource,
    stepsCompleted: number,
    metadata: Record<string, unknown> = {},
  ): string | undefined {
    if (this.intervalSteps <= 0 || stepsCompleted <= 0 || stepsCompleted % this.intervalSteps !== 0) return undefined;
    return this.manager.save(network, time, { ...metadata, steps_completed: stepsCompleted });
  }
}

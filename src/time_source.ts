import { setTimeout as sleepMs } from "node:timers/promises";
import { z } from "zod";
import { CheckpointMismatchError, ConfigError } from "./errors.js";

export type TimeMode = "logical" | "paced";

export const timeSourceStateSchema = z.object({
  instant: z.number().finite(),
  mode: z.enum(["logical", "paced"]),
  step: z.number().finite().nonnegative(),
});

export type TimeSourceState = z.infer<typeof timeSourceStateSchema>;

export type TimeSource = {
  readonly mode: TimeMode;
  /** Nominal increment, also handed to blocks as `dt`. */
  readonly step: number;
  now(): number;
  /** The only mutator: moves to the next instant and resolves with it. */
  advance(dt?: number): Promise<number>;
  getState(): TimeSourceState;
  setState(state: TimeSourceState): void;
};

function checkMode(expected: TimeMode, state: TimeSourceState): void {
  if (state.mode !== expected) {
    throw new CheckpointMismatchError([], [`time source mode '${state.mode}' (live source is '${expected}')`]);
  }
}

/** Time that moves only when told to; replays are reproducible. */
export class LogicalTimeSource implements TimeSource {
  readonly mode = "logical" as const;
  private instant: number;
  private increment: number;

  constructor(opts: { origin?: number; step?: number } = {}) {
    this.instant = opts.origin ?? 0;
    this.increment = opts.step ?? 0;
    if (!Number.isFinite(this.instant)) throw new ConfigError(`invalid time origin ${this.instant}`);
    if (!(this.increment >= 0) || !Number.isFinite(this.increment)) throw new ConfigError(`invalid time step ${this.increment}`);
  }

  get step(): number {
    return this.increment;
  }

  now(): number {
    return this.instant;
  }

  async advance(dt?: number): Promise<number> {
    const by = dt ?? this.increment;
    if (!Number.isFinite(by) || by < 0) throw new RangeError(`time increment must be a non-negative number, got ${by}`);
    if (dt === undefined && this.increment === 0) throw new RangeError("logical time needs a step or an explicit increment");
    this.instant += by;
    return this.instant;
  }

  getState(): TimeSourceState {
    return { instant: this.instant, mode: this.mode, step: this.increment };
  }

  setState(state: TimeSourceState): void {
    checkMode(this.mode, state);
    this.instant = state.instant;
    this.increment = state.step;
  }
}

export type Clock = () => number;
export type Sleep = (ms: number) => Promise<unknown>;

/**
 * Wall-clock pacing. Instants are seconds on `clock`; `advance` waits for the
 * next scheduled instant and lands exactly on it, so lateness in one step does
 * not shift the schedule.
 */
export class PacedTimeSource implements TimeSource {
  readonly mode = "paced" as const;
  private instant: number;
  private increment: number;
  private readonly clock: Clock;
  private readonly sleep: Sleep;

  constructor(opts: { step: number; origin?: number; clock?: Clock; sleep?: Sleep }) {
    if (!(opts.step > 0) || !Number.isFinite(opts.step)) throw new ConfigError(`paced time needs a positive step, got ${opts.step}`);
    this.increment = opts.step;
    this.clock = opts.clock ?? (() => Date.now() / 1000);
    this.sleep = opts.sleep ?? ((ms) => sleepMs(ms));
    this.instant = opts.origin ?? this.clock();
  }

  get step(): number {
    return this.increment;
  }

  now(): number {
    return this.instant;
  }

  async advance(dt?: number): Promise<number> {
    if (dt !== undefined) throw new RangeError("paced time advances by its fixed step only");
    const next = this.instant + this.increment;
    const wait = (next - this.clock()) * 1000;
    if (wait > 0) await this.sleep(wait);
    this.instant = next;
    return this.instant;
  }

  getState(): TimeSourceState {
    return { instant: this.instant, mode: this.mode, step: this.increment };
  }

  setState(state: TimeSourceState): void {
    checkMode(this.mode, state);
    if (!(state.step > 0)) throw new CheckpointMismatchError([], [`paced time step ${state.step}`]);
    this.instant = state.instant;
    this.increment = state.step;
  }
}

export type TimeConfig = {
  mode: TimeMode;
  step: number;
  origin?: number;
};

export function createTimeSource(cfg: TimeConfig, deps: { clock?: Clock; sleep?: Sleep } = {}): TimeSource {
  if (cfg.mode === "paced") return new PacedTimeSource({ step: cfg.step, origin: cfg.origin, ...deps });
  return new LogicalTimeSource({ step: cfg.step, origin: cfg.origin });
}

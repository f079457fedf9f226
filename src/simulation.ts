import type { Block, SignalMap, StepContext } from "./block.js";
import { createCheckpoint, restoreCheckpoint, type AutoCheckpointer, type Checkpoint } from "./checkpoint.js";
import { silentLogger, type Logger } from "./log.js";
import type { TimeSource } from "./time_source.js";

/** A block that also knows how to run one whole evaluate/commit step. */
export type StepRunner = Block & {
  step(inputs: SignalMap, ctx: StepContext): SignalMap;
};

export type SimulationOptions = {
  autoCheckpoint?: AutoCheckpointer;
  logger?: Logger;
};

export type StepRecord = {
  step: number;
  time: number;
  outputs: SignalMap;
};

/** Drives a runtime against a time source, one step per `step()` call. */
export class Simulation {
  private completed = 0;
  private readonly logger: Logger;

  constructor(
    readonly runtime: StepRunner,
    readonly time: TimeSource,
    private readonly opts: SimulationOptions = {},
  ) {
    this.logger = opts.logger ?? silentLogger;
  }

  get stepsCompleted(): number {
    return this.completed;
  }

  context(): StepContext {
    return { time: this.time.now(), dt: this.time.step, step: this.completed };
  }

  async step(inputs: SignalMap): Promise<SignalMap> {
    const ctx = this.context();
    const outputs = this.runtime.step(inputs, ctx);
    this.completed += 1;
    await this.time.advance();
    const file = this.opts.autoCheckpoint?.maybeCheckpoint(this.runtime, this.time, this.completed);
    if (file) this.logger.debug(`step=${this.completed} checkpoint=${file}`);
    return outputs;
  }

  async run(sequence: readonly SignalMap[]): Promise<StepRecord[]> {
    const records: StepRecord[] = [];
    for (const inputs of sequence) {
      const time = this.time.now();
      const step = this.completed;
      records.push({ step, time, outputs: await this.step(inputs) });
    }
    this.logger.debug(`ran steps=${records.length} t=${this.time.now()}`);
    return records;
  }

  checkpoint(metadata: Record<string, unknown> = {}): Checkpoint {
    return createCheckpoint(this.runtime, this.time, { ...metadata, steps_completed: this.completed });
  }

  restore(snapshot: Checkpoint): void {
    restoreCheckpoint(snapshot, this.runtime, this.time);
    this.resumeFrom(snapshot.metadata);
  }

  /** Picks the step counter back up from checkpoint metadata, when it carries one. */
  resumeFrom(metadata: Record<string, unknown>): void {
    const n = metadata["steps_completed"];
    this.completed = typeof n === "number" && Number.isInteger(n) && n >= 0 ? n : 0;
  }
}

import { describe, expect, it } from "vitest";
import { AutoCheckpointer, CheckpointManager } from "./checkpoint.js";
import { NetworkRuntime } from "./engine.js";
import { StepEvaluationError } from "./errors.js";
import { resolveFile } from "./resolve.js";
import { Simulation } from "./simulation.js";
import { fixture, tempDir } from "./test_support.js";
import { LogicalTimeSource, PacedTimeSource } from "./time_source.js";

const chain = () => new NetworkRuntime(resolveFile(fixture("chain.jsonld")).root);

describe("Simulation", () => {
  it("runs one step per input map and advances time after each", async () => {
    const time = new LogicalTimeSource({ step: 1 });
    const sim = new Simulation(chain(), time);
    const records = await sim.run([{ u: 3 }, { u: 0 }]);
    expect(records).toEqual([
      { step: 0, time: 0, outputs: { x: 6, y: 0 } },
      { step: 1, time: 1, outputs: { x: 0, y: 6 } },
    ]);
    expect(time.now()).toBe(2);
    expect(sim.stepsCompleted).toBe(2);
  });

  it("hands the time source's step to blocks as dt", async () => {
    const sim = new Simulation(chain(), new LogicalTimeSource({ step: 0.5 }));
    await sim.step({ u: 4 });
    expect(sim.context()).toEqual({ time: 0.5, dt: 0.5, step: 1 });
    expect(await sim.step({ u: 0 })).toEqual({ x: 0, y: 4 });
  });

  it("leaves time and the step count alone when a step fails", async () => {
    const time = new LogicalTimeSource({ step: 1 });
    const sim = new Simulation(chain(), time);
    await expect(sim.step({})).rejects.toThrow(StepEvaluationError);
    expect(time.now()).toBe(0);
    expect(sim.stepsCompleted).toBe(0);
  });

  it("checkpoints automatically and resumes where it left off", async () => {
    const manager = new CheckpointManager({ directory: tempDir() });
    const sim = new Simulation(chain(), new LogicalTimeSource({ step: 1 }), {
      autoCheckpoint: new AutoCheckpointer(manager, 2),
    });
    const records = await sim.run([{ u: 3 }, { u: 0 }, { u: 1 }]);
    expect(manager.list()).toHaveLength(1);

    const resumedTime = new LogicalTimeSource({ step: 1 });
    const resumed = new Simulation(chain(), resumedTime);
    resumed.restore(manager.load(manager.latest() ?? ""));
    expect(resumed.stepsCompleted).toBe(2);
    expect(resumedTime.now()).toBe(2);
    expect(await resumed.run([{ u: 1 }])).toEqual([records[2]]);
  });

  it("carries the step count in manual checkpoints", async () => {
    const sim = new Simulation(chain(), new LogicalTimeSource({ step: 1 }));
    await sim.step({ u: 1 });
    expect(sim.checkpoint({ tag: "t" }).metadata).toEqual({ tag: "t", steps_completed: 1 });
  });

  it("paces steps against the clock", async () => {
    const waits: number[] = [];
    let now = 0;
    const time = new PacedTimeSource({
      step: 1,
      origin: 0,
      clock: () => now,
      sleep: async (ms) => {
        waits.push(ms);
        now += ms / 1000;
      },
    });
    await new Simulation(chain(), time).run([{ u: 1 }, { u: 1 }]);
    expect(waits).toEqual([1000, 1000]);
    expect(time.now()).toBe(2);
  });
});

import fs from "fs";
import path from "path";
import { describe, expect, it } from "vitest";
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, loadInputPlan, runCli } from "./cli.js";
import { ConfigError } from "./errors.js";
import { fixture, tempDir } from "./test_support.js";

function capture() {
  const out: string[] = [];
  const err: string[] = [];
  return { out, err, io: { stdout: (l: string) => out.push(l), stderr: (l: string) => err.push(l) } };
}

describe("runCli check", () => {
  it("prints the root and its evaluation order", async () => {
    const c = capture();
    const code = await runCli(["check", fixture("MyController.jsonld"), "--search-path", fixture("lib")], c.io);
    expect(code).toBe(EXIT_OK);
    expect(c.out).toEqual(["MyController: ok networks=3 order=sub1,sub2,sum"]);
  });

  it("takes search paths from a config file", async () => {
    const c = capture();
    const code = await runCli(["check", fixture("MyController.jsonld"), "--config", fixture("my_controller.yaml")], c.io);
    expect(code).toBe(EXIT_OK);
  });

  it("reports failures with their category", async () => {
    const c = capture();
    expect(await runCli(["check", fixture("cycle", "A.jsonld")], c.io)).toBe(EXIT_FAILURE);
    expect(c.err).toEqual(["error[circular-dependency]: circular composite dependency: A → B → A"]);

    const d = capture();
    expect(await runCli(["check", fixture("missing.jsonld")], d.io)).toBe(EXIT_FAILURE);
    expect(d.err[0]?.startsWith("error[unresolved-reference]: cannot resolve block type 'NoSuchController'")).toBe(true);
  });
});

describe("runCli usage", () => {
  it("exits 2 without a command", async () => {
    const c = capture();
    expect(await runCli([], c.io)).toBe(EXIT_USAGE);
    expect(c.err[0]).toBe("usage: a command is required");
  });

  it("exits 2 on unknown options and missing required ones", async () => {
    expect(await runCli(["check", fixture("chain.jsonld"), "--bogus"], capture().io)).toBe(EXIT_USAGE);
    expect(await runCli(["translate", fixture("chain.jsonld")], capture().io)).toBe(EXIT_USAGE);
  });
});

describe("runCli translate", () => {
  it("writes artifacts and prints their paths", async () => {
    const out = tempDir();
    const c = capture();
    const code = await runCli(
      ["translate", fixture("MyController.jsonld"), "-o", out, "--search-path", fixture("lib"), "--runtime-module", "../rt.js"],
      c.io,
    );
    expect(code).toBe(EXIT_OK);
    expect(c.out).toEqual(["Delay.ts", "SubController.ts", "MyController.ts"].map((f) => path.join(out, f)));
    expect(c.err).toEqual(["translate: networks=3 written=3"]);
    expect(fs.readFileSync(path.join(out, "Delay.ts"), "utf8")).toContain('import * as cdl from "../rt.js";');
  });
});

describe("runCli simulate", () => {
  it("prints per-step outputs as JSON", async () => {
    const c = capture();
    const code = await runCli(["simulate", fixture("chain.jsonld"), "--inputs", fixture("inputs", "chain.json")], c.io);
    expect(code).toBe(EXIT_OK);
    expect(JSON.parse(c.out.join("\n"))).toEqual({
      network: "ChainController",
      steps: [
        { step: 0, time: 0, outputs: { x: 6, y: 0 } },
        { step: 1, time: 1, outputs: { x: 0, y: 6 } },
        { step: 2, time: 2, outputs: { x: 2, y: 6 } },
      ],
    });
  });

  it("checkpoints and resumes from the latest checkpoint", async () => {
    const dir = tempDir();
    const first = capture();
    const run = ["simulate", fixture("chain.jsonld"), "--inputs", fixture("inputs", "chain.json"), "--checkpoint-dir", dir];
    expect(await runCli([...run, "--checkpoint-every", "2"], first.io)).toBe(EXIT_OK);
    expect(fs.readdirSync(dir)).toEqual(["checkpoint-000001.json"]);

    const second = capture();
    const results = path.join(dir, "out", "results.json");
    const code = await runCli(
      [
        "simulate",
        fixture("chain.jsonld"),
        "--inputs",
        fixture("inputs", "constant.yaml"),
        "--steps",
        "1",
        "--checkpoint-dir",
        dir,
        "--restore",
        "latest",
        "-o",
        results,
      ],
      second.io,
    );
    expect(code).toBe(EXIT_OK);
    expect(second.out).toEqual([]);
    expect(JSON.parse(fs.readFileSync(results, "utf8")).steps).toEqual([{ step: 2, time: 2, outputs: { x: 20, y: 6 } }]);
  });

  it("fails a step with the instance path", async () => {
    const dir = tempDir();
    const inputs = path.join(dir, "inputs.json");
    fs.writeFileSync(inputs, JSON.stringify([{ v: 1 }]));
    const c = capture();
    expect(await runCli(["simulate", fixture("chain.jsonld"), "--inputs", inputs], c.io)).toBe(EXIT_FAILURE);
    expect(c.err).toEqual(["error[step-evaluation]: step failed in '<network>': missing input 'u'"]);
  });
});

describe("runCli blocks", () => {
  it("lists the catalogue", async () => {
    const c = capture();
    expect(await runCli(["blocks"], c.io)).toBe(EXIT_OK);
    expect(c.out).toContain("Reals.IntegratorWithReset");
    expect(c.out).toContain("Discrete.UnitDelay");
  });
});

describe("loadInputPlan", () => {
  it("repeats a single map and caps a list", () => {
    expect(loadInputPlan(fixture("inputs", "constant.yaml"), 2).sequence).toEqual([{ u: 10 }, { u: 10 }]);
    expect(loadInputPlan(fixture("inputs", "chain.json"), 2).sequence).toEqual([{ u: 3 }, { u: 0 }]);
    expect(() => loadInputPlan(fixture("inputs", "chain.json"), 4)).toThrow(ConfigError);
  });

  it("reads parameters next to the steps", () => {
    const file = path.join(tempDir(), "plan.yaml");
    fs.writeFileSync(file, "parameters:\n  k: 4\nsteps:\n  - u: 1\n");
    expect(loadInputPlan(file)).toEqual({ parameters: { k: 4 }, sequence: [{ u: 1 }] });
  });
});

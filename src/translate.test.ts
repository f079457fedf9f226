import fs from "fs";
import path from "path";
import { describe, expect, it } from "vitest";
import { createLogger } from "./log.js";
import { fixture, tempDir } from "./test_support.js";
import { translateFile } from "./translate.js";

describe("translateFile", () => {
  it("writes one module per composite and logs a summary", () => {
    const out = tempDir();
    const lines: string[] = [];
    const artifacts = translateFile(fixture("MyController.jsonld"), {
      outDir: out,
      searchPaths: [fixture("lib")],
      logger: createLogger("translate", { sink: (l) => lines.push(l) }),
    });

    expect(artifacts.map((a) => a.name)).toEqual(["Delay", "SubController", "MyController"]);
    expect(fs.readdirSync(out).sort()).toEqual(["Delay.ts", "MyController.ts", "SubController.ts"]);
    expect(fs.readFileSync(path.join(out, "MyController.ts"), "utf8")).toBe(artifacts[2]?.code);
    expect(lines).toEqual(["translate: networks=3 written=3"]);
  });

  it("only generates when no output directory is given", () => {
    const lines: string[] = [];
    const artifacts = translateFile(fixture("chain.jsonld"), {
      logger: createLogger("translate", { sink: (l) => lines.push(l) }),
    });
    expect(artifacts).toHaveLength(1);
    expect(lines).toEqual(["translate: networks=1 written=0"]);
  });
});

import { describe, expect, it } from "vitest";
import * as runtime from "./index.js";

describe("runtime entry point", () => {
  it("exports what generated modules call, and not the command line", () => {
    for (const name of ["createElementary", "evaluateInstance", "readSignal", "readNumber", "readBoolean"]) {
      expect(typeof Reflect.get(runtime, name)).toBe("function");
    }
    expect("runCli" in runtime).toBe(false);
  });
});

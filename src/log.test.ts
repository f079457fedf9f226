import { describe, expect, it } from "vitest";
import { createLogger } from "./log.js";

describe("createLogger", () => {
  it("prefixes every line with its scope and hides debug unless verbose", () => {
    const lines: string[] = [];
    const quiet = createLogger("check", { sink: (l) => lines.push(l) });
    quiet.info("networks=2");
    quiet.warn("unused parameter k");
    quiet.error("bad");
    quiet.debug("hidden");
    createLogger("check", { verbose: true, sink: (l) => lines.push(l) }).debug("shown");
    expect(lines).toEqual([
      "check: networks=2",
      "check: warning: unused parameter k",
      "check: error: bad",
      "check: debug: shown",
    ]);
  });
});

#!/usr/bin/env node
import { hideBin } from "yargs/helpers";
import { runCli } from "./cli.js";

async function main() {
  process.exitCode = await runCli(hideBin(process.argv));
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});

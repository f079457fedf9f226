import path from "path";
import { pathToFileURL } from "url";
import { generateArtifacts, type Artifact } from "./codegen.js";
import { createLogger, silentLogger, type Logger } from "./log.js";
import { resolveFile } from "./resolve.js";
import { writeText } from "./util.js";

export type TranslateOptions = {
  /** Where `<Name>.ts` files are written; nothing is written without it. */
  outDir?: string;
  searchPaths?: string[];
  runtimeModule?: string;
  logger?: Logger;
};

/** Resolves `input`, generates one artifact per composite (leaves first) and writes them. */
export function translateFile(input: string, opts: TranslateOptions = {}): Artifact[] {
  const logger = opts.logger ?? silentLogger;
  const { networks } = resolveFile(input, { searchPaths: opts.searchPaths, logger });
  const artifacts = generateArtifacts(networks, { runtimeModule: opts.runtimeModule });

  let written = 0;
  if (opts.outDir) {
    for (const a of artifacts) {
      const file = path.join(opts.outDir, a.fileName);
      writeText(file, a.code);
      logger.debug(`wrote ${file}`);
      written += 1;
    }
  }
  logger.info(`networks=${networks.length} written=${written}`);
  return artifacts;
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 4) {
  const [input, outDir, ...searchPaths] = process.argv.slice(2);
  if (input && outDir) translateFile(input, { outDir, searchPaths, logger: createLogger("translate") });
}

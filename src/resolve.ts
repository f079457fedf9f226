import path from "path";
import { compositeName, defaultCatalog, type BlockCatalog } from "./blocks/catalog.js";
import { parseDocumentFile, type ParsedDocument } from "./document_parse.js";
import { CircularDependencyError, MalformedDocumentError, UnresolvedReferenceError } from "./errors.js";
import { silentLogger, type Logger } from "./log.js";
import { dependencyOrder, type NetworkModel } from "./model.js";
import { buildNetworkModel, type ResolvedType } from "./network_validate.js";
import { die, firstExisting } from "./util.js";

export const DOCUMENT_EXTENSIONS = [".jsonld", ".json"];

export type ResolveOptions = {
  /** Directories searched, in order, after the referencing document's own directory. */
  searchPaths?: string[];
  catalog?: BlockCatalog;
  logger?: Logger;
};

/** Everything one resolution run threads through its recursion. */
export type ResolutionContext = {
  catalog: BlockCatalog;
  searchPaths: string[];
  logger: Logger;
  /** Completed composites by type name. */
  memo: Map<string, NetworkModel>;
  /** Composites currently being resolved, outermost first. */
  chain: string[];
  documents: Map<string, ParsedDocument>;
};

export type Resolution = {
  root: NetworkModel;
  /** Every composite involved, leaves first and `root` last. */
  networks: NetworkModel[];
};

export function createResolutionContext(opts: ResolveOptions = {}): ResolutionContext {
  return {
    catalog: opts.catalog ?? defaultCatalog,
    searchPaths: (opts.searchPaths ?? []).map((p) => path.resolve(p)),
    logger: opts.logger ?? silentLogger,
    memo: new Map(),
    chain: [],
    documents: new Map(),
  };
}

function candidates(ctx: ResolutionContext, name: string, baseDir: string | undefined): string[] {
  const dirs: string[] = [];
  for (const d of [baseDir, ...ctx.searchPaths]) {
    if (d !== undefined && !dirs.includes(d)) dirs.push(d);
  }
  return dirs.flatMap((d) => DOCUMENT_EXTENSIONS.map((ext) => path.join(d, `${name}${ext}`)));
}

function loadDocument(ctx: ResolutionContext, file: string): ParsedDocument {
  const cached = ctx.documents.get(file);
  if (cached) return cached;
  const doc = parseDocumentFile(file);
  ctx.documents.set(file, doc);
  ctx.logger.debug(`loaded ${file} composites=${[...doc.definitions.keys()].join(",")}`);
  return doc;
}

function resolveComposite(ctx: ResolutionContext, from: ParsedDocument, name: string): NetworkModel {
  const done = ctx.memo.get(name);
  if (done) return done;
  if (ctx.chain.includes(name)) throw new CircularDependencyError([...ctx.chain, name]);
  if (from.definitions.has(name)) return resolveDefinition(ctx, from, name);

  const tried: string[] = [];
  const file = firstExisting(candidates(ctx, name, from.baseDir), tried);
  if (!file) throw new UnresolvedReferenceError(name, tried);
  const doc = loadDocument(ctx, file);
  if (!doc.definitions.has(name)) {
    throw new MalformedDocumentError(file, "@graph", `expected a CompositeBlock named '${name}'`);
  }
  return resolveDefinition(ctx, doc, name);
}

function resolveDefinition(ctx: ResolutionContext, doc: ParsedDocument, name: string): NetworkModel {
  const done = ctx.memo.get(name);
  if (done) return done;
  if (ctx.chain.includes(name)) throw new CircularDependencyError([...ctx.chain, name]);
  const def = doc.definitions.get(name) ?? die(`no definition '${name}' in ${doc.source ?? "document"}`);

  ctx.chain.push(name);
  try {
    const types = new Map<string, ResolvedType>();
    for (const inst of def.instances) {
      const blockType = ctx.catalog.lookup(inst.typeName);
      if (blockType) {
        types.set(inst.name, { kind: "elementary", blockType });
      } else {
        types.set(inst.name, { kind: "composite", network: resolveComposite(ctx, doc, compositeName(inst.typeName)) });
      }
    }
    const model = buildNetworkModel(def, types, doc.source);
    model.evaluationOrder();
    ctx.memo.set(name, model);
    ctx.logger.debug(`resolved ${name} instances=${model.instances.length} connections=${model.connections.length}`);
    return model;
  } finally {
    ctx.chain.pop();
  }
}

export function resolveDocument(doc: ParsedDocument, opts: ResolveOptions | ResolutionContext = {}): Resolution {
  const ctx = "memo" in opts ? opts : createResolutionContext(opts);
  if (doc.source) ctx.documents.set(doc.source, doc);
  const root = resolveDefinition(ctx, doc, doc.root);
  return { root, networks: dependencyOrder(root) };
}

export function resolveFile(file: string, opts: ResolveOptions = {}): Resolution {
  return resolveDocument(parseDocumentFile(file), opts);
}

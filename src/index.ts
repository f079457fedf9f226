export * from "./block.js";
export * from "./errors.js";
export * from "./model.js";
export { BlockCatalog, BUILTIN_LOCATION, compositeName, createElementary, defaultCatalog, elementaryName } from "./blocks/catalog.js";
export { parseDocument, parseDocumentFile, parseDocumentText, type CompositeDefinition, type ParsedDocument } from "./document_parse.js";
export { buildNetworkModel, signalAssignable } from "./network_validate.js";
export { createResolutionContext, resolveDocument, resolveFile, type Resolution, type ResolveOptions } from "./resolve.js";
export { computeEvaluationOrder, findCycle } from "./schedule.js";
export {
  bindParameters,
  evaluateInstance,
  NetworkRuntime,
  readBoolean,
  readNumber,
  readSignal,
} from "./engine.js";
export * from "./time_source.js";
export { Simulation, type SimulationOptions, type StepRecord } from "./simulation.js";
export * from "./checkpoint.js";
export { DEFAULT_RUNTIME_MODULE, generateArtifact, generateArtifacts, type Artifact, type GenerateOptions } from "./codegen.js";
export { translateFile, type TranslateOptions } from "./translate.js";
export { defaultConfig, loadConfig, parseConfig, type Config } from "./config.js";
export { createLogger, silentLogger, type Logger } from "./log.js";

export { CliEngineBackend, createCliEngineBackend, parseRedactResponse } from './cli-engine.js';
export type { CliEngineOptions, EngineRedactRequestV1, EngineRedactResponseV1 } from './cli-engine.js';

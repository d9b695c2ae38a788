export { resolveClientConfig, loadClientConfig, readEnvFiles, defaultConfigPaths, ENV_KEYS } from './config/index.js';
export type { ConfigResolution, ResolveConfigOptions } from './config/index.js';
export { createFetchTransport, encodeEvent, toWirePayload, runtimeContext, CLIENT_NAME, CLIENT_VERSION } from './transport/index.js';
export type { Transport, TransportRequest, TransportResponse, WirePayload, RuntimeContext } from './transport/index.js';
export { DeliveryClient, backoffDelay, classifyResponse, classifyFailure } from './delivery/index.js';
export type { DeliveryClientDeps, AttemptOutcome } from './delivery/index.js';
export { createDiagnosticLogger } from './logging.js';

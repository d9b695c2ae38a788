export { createFetchTransport } from './http-transport.js';
export type { Transport, TransportRequest, TransportResponse } from './http-transport.js';
export {
  encodeEvent,
  toWirePayload,
  runtimeContext,
  CLIENT_NAME,
  CLIENT_VERSION,
} from './wire-format.js';
export type { WirePayload, RuntimeContext } from './wire-format.js';

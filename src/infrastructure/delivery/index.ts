export { DeliveryClient } from './delivery-client.js';
export type { DeliveryClientDeps } from './delivery-client.js';
export { backoffDelay, classifyResponse, classifyFailure, sleep } from './retry-policy.js';
export type { AttemptOutcome } from './retry-policy.js';

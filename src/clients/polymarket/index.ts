export { DataApiClient } from './DataApiClient.js';
export type { DataApiClientOptions } from './DataApiClient.js';
export { ClobExecutionClient } from './ClobExecutionClient.js';
export type { ClobExecutionClientOptions, ClobOrderApi } from './ClobExecutionClient.js';
export * from './types.js';

export { FreigentClient, FreigentClientError } from './client.js';
export type { FreigentClientOptions } from './client.js';
export type * from './types.js';

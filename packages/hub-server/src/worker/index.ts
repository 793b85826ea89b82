export { RecommendationWorker } from './worker.js';
export type { WorkerDeps } from './worker.js';
export * from './protocol.js';

export { SyncWorker, syncWorker } from './sync.worker.core';

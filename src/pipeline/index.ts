export { Coordinator, type CoordinatorOptions } from './coordinator';
export { Deduplicator, deduplicate, fingerprint, normalizeKeyPart, type OfferResult } from './deduplicator';
export { Harvester, buildRecord, type HarvesterContext, type TaskResult } from './harvester';
export { QUEUE_DRAINED, TaskQueue, type QueueDrained } from './taskQueue';

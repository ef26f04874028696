/**
 * Infrastructure
 * Redis and BullMQ wiring shared by the API process and workers
 */

export * from './redis';
export * from './queues';

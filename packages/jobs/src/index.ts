export * from './errors';
export * from './job.types';
export { FILE_STATS_TASK } from './task-names';
export { encode, decode, decodeText } from './codec/payload-codec';
export type { BrokerChannel, DeliveryHandler } from './broker/broker-channel';
export { PgBrokerChannel } from './broker/pg-broker-channel';
export type { JobStore } from './store/job-store';
export { PgJobStore, CorruptJobRecordError } from './store/pg-job-store';
export { JobHandle } from './job-handle';
export { TaskQueue } from './task-queue';
export type { TaskQueueOptions } from './task-queue';
export { createPool } from './db';
export type { PoolName } from './db';

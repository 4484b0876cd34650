import { FILE_STATS_TASK } from '@pkg/jobs';
import { TaskRegistry } from './task-registry';
import { fileStats } from './file-stats.task';

export { TaskRegistry } from './task-registry';
export type { TaskFn } from './task-registry';

/** Every task this worker can run. */
export function createTaskRegistry(): TaskRegistry {
  return new TaskRegistry().register(FILE_STATS_TASK, fileStats);
}

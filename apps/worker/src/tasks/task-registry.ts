import type { TaskOutcome } from '@pkg/jobs';
import { DuplicateTaskError, UnknownTaskError } from '../errors';

/**
 * A task receives the decoded payload bytes. Business failures are returned
 * as a failure outcome; a thrown DecodeError is turned into one by the
 * executor.
 */
export type TaskFn = (input: Buffer) => TaskOutcome | Promise<TaskOutcome>;

export class TaskRegistry {
  private readonly tasks = new Map<string, TaskFn>();

  register(name: string, fn: TaskFn): this {
    if (this.tasks.has(name)) {
      throw new DuplicateTaskError(name);
    }
    this.tasks.set(name, fn);
    return this;
  }

  get(name: string): TaskFn {
    const fn = this.tasks.get(name);
    if (!fn) {
      throw new UnknownTaskError(name);
    }
    return fn;
  }

  names(): string[] {
    return [...this.tasks.keys()];
  }
}

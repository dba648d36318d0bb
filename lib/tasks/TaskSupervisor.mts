/**
 * Task Supervisor
 *
 * Runs named background tasks grouped under a key, cancels them by key, and
 * waits for everything to settle when its scope ends. Each task receives an
 * AbortSignal; an abort error thrown by a cancelled task is a clean exit.
 */

import { assertPrecondition, isAbortError } from '../errors.mjs';
import { createLogger, type Logger } from '../utils/Logger.mjs';
import type { LoggerFunction } from '../types.mjs';

/** Body of a background task */
export type TaskBody = (signal: AbortSignal) => Promise<void>;

interface RunningTask {
  name: string;
  key: string;
  controller: AbortController;
  done: Promise<void>;
}

export class TaskSupervisor {
  private tasks: Set<RunningTask> = new Set();
  private active: boolean = false;
  private logger: Logger;

  constructor(logger?: LoggerFunction) {
    this.logger = createLogger('TaskSupervisor', logger);
  }

  /**
   * Names of the tasks still running
   */
  get taskNames(): string[] {
    return Array.from(this.tasks, (task) => task.name);
  }

  get isActive(): boolean {
    return this.active;
  }

  async enter(): Promise<void> {
    assertPrecondition(!this.active, 'task supervisor already entered');
    this.active = true;
  }

  /**
   * Start a task immediately under the given key
   */
  addTask(body: TaskBody, name: string, key: string): void {
    assertPrecondition(this.active, `cannot add task "${name}" outside the supervisor scope`);

    const controller = new AbortController();
    const task: RunningTask = { name, key, controller, done: Promise.resolve() };

    task.done = this.run(body, task).finally(() => {
      this.tasks.delete(task);
    });
    this.tasks.add(task);
    this.logger.log(`Started task "${name}" [${key}]`);
  }

  /**
   * Cancel every task under the key; resolves once they have settled
   */
  async cancelKeyTasks(key: string): Promise<void> {
    const cancelled = Array.from(this.tasks).filter((task) => task.key === key);
    for (const task of cancelled) {
      if (!task.controller.signal.aborted) {
        this.logger.log(`Cancelling task "${task.name}" [${key}]`);
        task.controller.abort();
      }
    }
    await Promise.all(cancelled.map((task) => task.done));
  }

  /**
   * Cancel the remaining tasks and wait for all of them to settle
   */
  async exit(): Promise<void> {
    const remaining = Array.from(this.tasks);
    for (const task of remaining) {
      task.controller.abort();
    }
    await Promise.all(remaining.map((task) => task.done));
    this.active = false;
  }

  private async run(body: TaskBody, task: RunningTask): Promise<void> {
    try {
      await body(task.controller.signal);
    } catch (error) {
      if (isAbortError(error) && task.controller.signal.aborted) {
        this.logger.log(`Task "${task.name}" cancelled`);
        return;
      }
      this.logger.error(`Task "${task.name}" failed:`, error);
    }
  }
}

import { ExecutorNotFoundError } from '../utils/errors.js';
import type { Executor } from './types.js';

/**
 * Task -> Executor Zuordnung.
 * Neue Engines werden hier registriert, der Router bleibt unverändert.
 */
export class ExecutorRegistry {
  private executors = new Map<string, Executor>();

  register(executor: Executor): this {
    const key = executor.task.trim().toUpperCase();
    if (!key) {
      throw new Error('Executor braucht einen Task-Namen');
    }
    if (this.executors.has(key)) {
      throw new Error(`Executor für ${key} bereits registriert`);
    }
    this.executors.set(key, executor);
    return this;
  }

  has(task: string): boolean {
    return this.executors.has(task.trim().toUpperCase());
  }

  /**
   * @throws ExecutorNotFoundError wenn für den Task nichts registriert ist
   */
  resolve(task: string): Executor {
    const executor = this.executors.get(task.trim().toUpperCase());
    if (!executor) {
      throw new ExecutorNotFoundError(task, this.supported());
    }
    return executor;
  }

  supported(): string[] {
    return [...this.executors.keys()].sort();
  }

  list(): Array<{ task: string; description: string }> {
    return this.supported().map((task) => ({
      task,
      description: this.executors.get(task)?.description ?? '',
    }));
  }
}

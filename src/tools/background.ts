/**
 * Owned background tasks
 *
 * Handoffs outlive the tool call that starts them: the persona answers at
 * once while the protocol runs on. Every task is tracked until it settles and
 * its failure is logged rather than lost.
 */

import type { Logger, ILogObj } from "tslog";
import { isAdvisoryError, toError } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";

export class BackgroundTasks {
  private readonly running = new Map<Promise<void>, string>();
  private readonly logger: Logger<ILogObj>;

  constructor(logger?: Logger<ILogObj>) {
    this.logger = logger ?? getLogger();
  }

  /**
   * Start `work` without waiting for it
   */
  run(label: string, work: () => Promise<void>): void {
    const task: Promise<void> = Promise.resolve()
      .then(work)
      .then(() => {
        this.logger.debug({ event: "task:complete", task: label });
      })
      .catch((error: unknown) => {
        if (isAdvisoryError(error)) {
          // Lost a race with another operation; the guard already explained itself
          this.logger.warn({ event: "task:rejected", task: label, code: error.code });
          return;
        }
        this.logger.error({ event: "task:failed", task: label, error: toError(error) });
      })
      .finally(() => {
        this.running.delete(task);
      });
    this.running.set(task, label);
  }

  get size(): number {
    return this.running.size;
  }

  labels(): string[] {
    return [...this.running.values()];
  }

  /**
   * Resolves once every task, including ones started meanwhile, has settled
   */
  async whenIdle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running.keys()]);
    }
  }
}

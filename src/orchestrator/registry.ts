/**
 * Context registry
 *
 * Owns one orchestrator per conversation context. Lookup-or-create and
 * removal run under a registry-wide lock; closed contexts are torn down after
 * a grace delay and never while their orchestrator is still non-terminal.
 */

import type { Logger, ILogObj } from "tslog";
import { createMutex } from "../utils/async.js";
import { toError } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";
import type { Orchestrator } from "./types.js";

export interface ContextRegistryOptions {
  create: (contextId: string) => Orchestrator;
  teardownGraceMs: number;
  logger?: Logger<ILogObj>;
}

export class ContextRegistry {
  private readonly contexts = new Map<string, Orchestrator>();
  private readonly timers = new Map<string, ReturnType<typeof setTimeout>>();
  private readonly teardowns = new Set<Promise<void>>();
  private readonly lock = createMutex();
  private readonly logger: Logger<ILogObj>;

  constructor(private readonly options: ContextRegistryOptions) {
    this.logger = options.logger ?? getLogger();
  }

  /**
   * Return the orchestrator for a context, creating it on first use
   */
  async getOrCreate(contextId: string): Promise<Orchestrator> {
    return this.lock.withLock(() => {
      const existing = this.contexts.get(contextId);
      if (existing) return existing;

      const orchestrator = this.options.create(contextId);
      orchestrator.on("closed", () => this.scheduleTeardown(contextId, orchestrator));
      this.contexts.set(contextId, orchestrator);
      this.logger.debug(`Registered context ${contextId}`);
      return orchestrator;
    });
  }

  get(contextId: string): Orchestrator | undefined {
    return this.contexts.get(contextId);
  }

  has(contextId: string): boolean {
    return this.contexts.has(contextId);
  }

  get size(): number {
    return this.contexts.size;
  }

  /**
   * Resolves once every scheduled teardown that has fired has finished
   */
  async whenIdle(): Promise<void> {
    while (this.teardowns.size > 0) {
      await Promise.all([...this.teardowns]);
    }
  }

  /**
   * Cancel pending teardowns and dispose every context immediately
   */
  async shutdown(): Promise<void> {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();

    const orchestrators = await this.lock.withLock(() => {
      const all = [...this.contexts.values()];
      this.contexts.clear();
      return all;
    });
    await Promise.all(orchestrators.map((orchestrator) => orchestrator.dispose()));
    await this.whenIdle();
  }

  private scheduleTeardown(contextId: string, orchestrator: Orchestrator): void {
    const previous = this.timers.get(contextId);
    if (previous) clearTimeout(previous);

    const timer = setTimeout(() => {
      this.timers.delete(contextId);
      const task: Promise<void> = this.teardown(contextId, orchestrator)
        .catch((error: unknown) => {
          this.logger.error({ event: "context:teardown_failed", contextId, error: toError(error) });
        })
        .finally(() => {
          this.teardowns.delete(task);
        });
      this.teardowns.add(task);
    }, this.options.teardownGraceMs);
    this.timers.set(contextId, timer);
  }

  private async teardown(contextId: string, orchestrator: Orchestrator): Promise<void> {
    const removed = await this.lock.withLock(() => {
      if (orchestrator.getState() !== "completed") {
        this.logger.warn(`Skipping teardown of non-terminal context ${contextId}`);
        return false;
      }
      if (this.contexts.get(contextId) === orchestrator) {
        this.contexts.delete(contextId);
      }
      return true;
    });

    if (removed) {
      await orchestrator.dispose();
      this.logger.debug(`Tore down context ${contextId}`);
    }
  }
}

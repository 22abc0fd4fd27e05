import type { BudgetingConfig } from "./budget/config.js";
import { BudgetTracker } from "./budget/tracker.js";
import type { BudgetTransition } from "./transition.js";
import { BudgetError } from "./utils/errors.js";
import { silentLogger, type Logger } from "./utils/logger.js";

export type ProjectBudgetsConfig = {
  /** Named budgeting configurations; each is shared by all trackers created under its name. */
  configs: Record<string, BudgetingConfig>;
  logger?: Logger;
  /**
   * Optional audit hook, called after a call flips a project's state.
   * A throwing hook is logged and otherwise ignored.
   */
  onTransition?: (record: BudgetTransition) => void;
};

type ConfigSlot = {
  config: BudgetingConfig;
  trackers: Map<string, BudgetTracker>;
};

/**
 * ProjectBudgets holds one BudgetTracker per (config name, project id).
 *
 * Trackers are created lazily on first use and dropped by `sweep` once stale.
 * It also enforces the tracker's caller contract: spend must be finite and non-negative.
 *
 * Calls are synchronous, so within one Node.js process every tracker has a single writer.
 */
export class ProjectBudgets {
  private readonly slots = new Map<string, ConfigSlot>();
  private readonly logger: Logger;
  private readonly onTransition?: (record: BudgetTransition) => void;

  constructor(config: ProjectBudgetsConfig) {
    const names = Object.keys(config.configs);
    if (names.length === 0) {
      throw new BudgetError("CONFIG_INVALID", "At least one budgeting config is required.");
    }
    for (const name of names) {
      const budgeting = config.configs[name];
      if (budgeting) this.slots.set(name, { config: budgeting, trackers: new Map() });
    }
    this.logger = config.logger ?? silentLogger;
    this.onTransition = config.onTransition;
  }

  /** Number of live trackers across all configs. */
  get size(): number {
    let n = 0;
    for (const slot of this.slots.values()) n += slot.trackers.size;
    return n;
  }

  configNames(): string[] {
    return [...this.slots.keys()];
  }

  has(configName: string, projectId: string): boolean {
    return this.slots.get(configName)?.trackers.has(projectId) ?? false;
  }

  /** Records spend for a project and returns whether it now exceeds its budget. */
  recordBudgetSpend(configName: string, projectId: string, spentBudget: number): boolean {
    if (!(Number.isFinite(spentBudget) && spentBudget >= 0)) {
      throw new BudgetError("SPEND_INVALID", "spentBudget must be a finite number >= 0.", {
        configName,
        projectId,
        spentBudget,
      });
    }
    const tracker = this.trackerFor(configName, projectId);
    const before = tracker.exceedsBudget;
    const exceeds = tracker.recordSpend(spentBudget);
    if (exceeds !== before) this.emitTransition(configName, projectId, tracker);
    return exceeds;
  }

  /** Returns whether a project currently exceeds its budget. */
  exceedsBudget(configName: string, projectId: string): boolean {
    const tracker = this.trackerFor(configName, projectId);
    const before = tracker.exceedsBudget;
    const exceeds = tracker.check();
    if (exceeds !== before) this.emitTransition(configName, projectId, tracker);
    return exceeds;
  }

  /** Drops every stale tracker. Returns how many were dropped. */
  sweep(): number {
    let evicted = 0;
    for (const [configName, slot] of this.slots) {
      const now = slot.config.now();
      for (const [projectId, tracker] of slot.trackers) {
        if (!tracker.isStale(now)) continue;
        slot.trackers.delete(projectId);
        evicted += 1;
        this.logger.debug({ configName, projectId }, "Evicted stale budget tracker");
      }
    }
    if (evicted > 0) this.logger.debug({ evicted, remaining: this.size }, "Budget sweep finished");
    return evicted;
  }

  /**
   * Runs `sweep` every `intervalMs`. The timer is unref'd so it never keeps the process alive.
   * Returns a function that stops it.
   */
  startSweeping(intervalMs: number): () => void {
    if (!(Number.isFinite(intervalMs) && intervalMs > 0)) {
      throw new BudgetError("CONFIG_INVALID", "Sweep interval must be a finite number > 0.", { intervalMs });
    }
    const timer = setInterval(() => this.sweep(), intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }

  private trackerFor(configName: string, projectId: string): BudgetTracker {
    const slot = this.slots.get(configName);
    if (!slot) {
      throw new BudgetError("UNKNOWN_CONFIG", `No budgeting config named "${configName}".`, {
        configName,
        known: this.configNames(),
      });
    }
    if (projectId.length === 0) {
      throw new BudgetError("PROJECT_INVALID", "projectId must be a non-empty string.", { configName });
    }

    let tracker = slot.trackers.get(projectId);
    if (!tracker) {
      tracker = new BudgetTracker(slot.config);
      slot.trackers.set(projectId, tracker);
      this.logger.debug({ configName, projectId }, "Created budget tracker");
    }
    return tracker;
  }

  private emitTransition(configName: string, projectId: string, tracker: BudgetTracker): void {
    const record: BudgetTransition = {
      at: new Date().toISOString(),
      configName,
      projectId,
      exceedsBudget: tracker.exceedsBudget,
      backoffDeadline: tracker.backoffDeadline,
      // Measured at the instant of the flip, not at a later clock read.
      totalSpent: tracker.totalSpent(tracker.lastEvaluatedAt),
    };
    this.logger.info(record, record.exceedsBudget ? "Project exceeds budget" : "Project back within budget");

    try {
      this.onTransition?.(record);
    } catch (e) {
      // Audit hooks must not break budget accounting.
      this.logger.warn({ err: e, configName, projectId }, "onTransition hook threw");
    }
  }
}

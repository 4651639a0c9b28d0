/**
 * PipelineSupervisor: restart policy for a PipelineRunner.
 * A run that ends with a fatal capture failure is restarted after an
 * exponentially growing delay, up to `maxRestarts` times. A run that stayed
 * up for `stableRunMs` before failing refills the budget. A cancelled run
 * (explicit stop) is never restarted.
 */

import type { LoopOutcome, PipelineSnapshot, StopResult } from "./types.js";
import type { PipelineRunner } from "./pipeline-runner.js";
import { createConsoleLogger, type Logger } from "./logger.js";

/** The part of PipelineRunner the supervisor drives. */
export type SupervisedRunner = Pick<
  PipelineRunner,
  "start" | "stop" | "getSnapshot" | "addExitListener"
>;

export interface RestartPolicy {
  maxRestarts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** A run lasting at least this long counts as healthy and resets the attempt count. */
  stableRunMs: number;
}

export const DEFAULT_RESTART_POLICY: RestartPolicy = {
  maxRestarts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  stableRunMs: 60_000,
};

export interface SupervisorDeps {
  policy?: Partial<RestartPolicy>;
  logger?: Logger;
  /** Called once the restart budget is exhausted. */
  onGiveUp?: (error: Error) => void;
  /** Epoch milliseconds. */
  now?: () => number;
}

export function restartDelay(attempt: number, policy: RestartPolicy): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, attempt));
}

export class PipelineSupervisor {
  private readonly runner: SupervisedRunner;
  private readonly policy: RestartPolicy;
  private readonly logger: Logger;
  private readonly onGiveUp?: (error: Error) => void;
  private readonly now: () => number;
  private restartTimer: ReturnType<typeof setTimeout> | null = null;
  private attempt = 0;
  private stopRequested = false;
  private runStartedAt = 0;

  constructor(runner: SupervisedRunner, deps: SupervisorDeps = {}) {
    this.runner = runner;
    this.policy = { ...DEFAULT_RESTART_POLICY, ...deps.policy };
    this.logger = deps.logger ?? createConsoleLogger("PipelineSupervisor");
    this.onGiveUp = deps.onGiveUp;
    this.now = deps.now ?? (() => Date.now());
    this.runner.addExitListener((outcome) => this.handleExit(outcome));
  }

  /** Start supervising. Resets the restart budget. */
  start(): boolean {
    this.stopRequested = false;
    this.attempt = 0;
    this.clearRestartTimer();
    return this.launch();
  }

  async stop(): Promise<StopResult> {
    this.stopRequested = true;
    this.clearRestartTimer();
    return this.runner.stop();
  }

  getSnapshot(): PipelineSnapshot {
    return this.runner.getSnapshot();
  }

  /** Restarts performed since the last start(). */
  get restarts(): number {
    return this.attempt;
  }

  get restartPending(): boolean {
    return this.restartTimer !== null;
  }

  private handleExit(outcome: LoopOutcome): void {
    if (outcome.kind === "cancelled" || this.stopRequested) {
      return;
    }

    const uptime = this.now() - this.runStartedAt;
    if (this.attempt > 0 && uptime >= this.policy.stableRunMs) {
      this.logger.info(`Run stayed up for ${uptime}ms; restart budget reset`);
      this.attempt = 0;
    }

    if (this.attempt >= this.policy.maxRestarts) {
      this.logger.error(
        `Giving up after ${this.attempt} restart(s): ${outcome.error.message}`,
      );
      this.onGiveUp?.(outcome.error);
      return;
    }

    const delay = restartDelay(this.attempt, this.policy);
    this.attempt++;
    this.logger.warn(
      `Pipeline failed (${outcome.error.message}); restart ${this.attempt}/${this.policy.maxRestarts} in ${delay}ms`,
    );
    this.restartTimer = setTimeout(() => {
      this.restartTimer = null;
      if (!this.stopRequested) {
        this.launch();
      }
    }, delay);
  }

  private launch(): boolean {
    this.runStartedAt = this.now();
    return this.runner.start();
  }

  private clearRestartTimer(): void {
    if (this.restartTimer !== null) {
      clearTimeout(this.restartTimer);
      this.restartTimer = null;
    }
  }
}

/**
 * PipelineRunner: owns the stand's background loop.
 * Reads frames one at a time, derives presence, matches the visitor's face
 * when a session could start, drives the SessionStateMachine and reports
 * every completed session before reading the next frame.
 *
 * The loop runs as a single async task on the event loop. It is the only
 * writer of session state; the control side reads frozen snapshots.
 * Cancellation is cooperative and checked once per iteration.
 */

import type {
  CaptureSource,
  DemographicsResult,
  Frame,
  LoopOutcome,
  PipelineSnapshot,
  Point,
  PoseDetection,
  StandCapabilities,
  StandConfig,
  StopResult,
} from "./types.js";
import { StandState } from "./types.js";
import { CaptureFailureError } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { PresenceEstimator } from "./presence-estimator.js";
import { selectCandidate } from "./candidate-selector.js";
import { buildDemographics, faceCropRegion } from "./demographics.js";
import { SessionStateMachine } from "./session-state-machine.js";
import type { ReportingSink } from "./reporting-sink.js";

export const LOOP_POLL_INTERVAL_MS = 10;
export const STOP_TIMEOUT_MS = 2000;

export type SessionReporter = Pick<ReportingSink, "reportStand" | "reportSession">;

export type ExitListener = (outcome: LoopOutcome) => void;

export interface PipelineRunnerDeps {
  config: StandConfig;
  /** Opens a fresh capture source for every run. */
  openCapture: () => Promise<CaptureSource>;
  capabilities: StandCapabilities;
  reporter: SessionReporter;
  logger?: Logger;
  now?: () => Date;
  pollIntervalMs?: number;
  stopTimeoutMs?: number;
  /** Session id generator handed to the state machine. */
  generateSessionId?: () => string;
}

interface LoopRun {
  controller: AbortController;
  done: Promise<LoopOutcome>;
  finished: boolean;
}

/** Resolves true if the signal aborted before `ms` elapsed. */
function waitForCancel(signal: AbortSignal, ms: number): Promise<boolean> {
  if (signal.aborted) return Promise.resolve(true);
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(true);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve(false);
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/** Resolves true if `promise` settled within `ms`. */
async function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });
  try {
    return await Promise.race([promise.then(() => true), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class PipelineRunner {
  private readonly deps: PipelineRunnerDeps;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly pollIntervalMs: number;
  private readonly stopTimeoutMs: number;
  private readonly exitListeners: Set<ExitListener> = new Set();

  private run: LoopRun | null = null;
  private machine: SessionStateMachine;
  private estimator: PresenceEstimator;
  private framesProcessed = 0;
  private sessionsCompleted = 0;

  constructor(deps: PipelineRunnerDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? createConsoleLogger("PipelineRunner");
    this.now = deps.now ?? (() => new Date());
    this.pollIntervalMs = deps.pollIntervalMs ?? LOOP_POLL_INTERVAL_MS;
    this.stopTimeoutMs = deps.stopTimeoutMs ?? STOP_TIMEOUT_MS;
    this.machine = this.createStateMachine();
    this.estimator = new PresenceEstimator();
  }

  // ─── Control Surface ────────────────────────────────────────────────────────

  isRunning(): boolean {
    return this.run !== null && !this.run.finished;
  }

  /**
   * Spawn the loop with fresh session state. Returns false, doing nothing,
   * if a loop is already running.
   */
  start(): boolean {
    if (this.isRunning()) {
      return false;
    }

    const controller = new AbortController();
    const machine = this.createStateMachine();
    const estimator = new PresenceEstimator();
    this.machine = machine;
    this.estimator = estimator;
    this.framesProcessed = 0;
    this.sessionsCompleted = 0;

    const run: LoopRun = {
      controller,
      finished: false,
      done: Promise.resolve<LoopOutcome>({ kind: "cancelled" }),
    };
    run.done = this.runLoop(controller.signal, machine, estimator).then((outcome) => {
      run.finished = true;
      this.notifyExit(outcome);
      return outcome;
    });
    this.run = run;

    this.logger.info(`Pipeline started for stand "${this.deps.config.name}"`);
    return true;
  }

  /**
   * Request cancellation and wait (bounded) for the loop to exit.
   * "timed_out" means the loop is still stuck inside a capture, inference or
   * report call; it is left running and will exit once that call returns.
   */
  async stop(): Promise<StopResult> {
    const run = this.run;
    if (run === null || run.finished) {
      return "not_running";
    }

    run.controller.abort();
    const exited = await settlesWithin(run.done, this.stopTimeoutMs);
    if (!exited) {
      this.logger.warn(
        `Loop did not exit within ${this.stopTimeoutMs}ms; it stays orphaned until its current call returns`,
      );
      return "timed_out";
    }
    return "stopped";
  }

  /** Resolves with the outcome of the current (or last) run. */
  async waitForExit(): Promise<LoopOutcome | null> {
    return this.run === null ? null : this.run.done;
  }

  addExitListener(listener: ExitListener): () => void {
    this.exitListeners.add(listener);
    return () => {
      this.exitListeners.delete(listener);
    };
  }

  getSnapshot(): PipelineSnapshot {
    return {
      ...this.machine.snapshot(),
      running: this.isRunning(),
      slowingDown: this.estimator.slowingDown,
      framesProcessed: this.framesProcessed,
      sessionsCompleted: this.sessionsCompleted,
    };
  }

  // ─── Internal: Loop ─────────────────────────────────────────────────────────

  private async runLoop(
    signal: AbortSignal,
    machine: SessionStateMachine,
    estimator: PresenceEstimator,
  ): Promise<LoopOutcome> {
    let capture: CaptureSource;
    try {
      capture = await this.deps.openCapture();
    } catch (err) {
      return this.fatal(
        err instanceof CaptureFailureError
          ? err
          : new CaptureFailureError(`Could not open capture source: ${describeError(err)}`, { cause: err }),
      );
    }

    try {
      while (!signal.aborted) {
        let frame: Frame;
        try {
          frame = await capture.read();
        } catch (err) {
          return this.fatal(
            err instanceof CaptureFailureError
              ? err
              : new CaptureFailureError(`Error while reading video capture: ${describeError(err)}`, { cause: err }),
          );
        }

        await this.processFrame(frame, machine, estimator);

        if (await waitForCancel(signal, this.pollIntervalMs)) {
          break;
        }
      }

      if (machine.current === StandState.ACTIVE) {
        this.logger.warn("Pipeline stopped during an active session; the visit is not reported");
      }
      this.logger.info("Pipeline loop cancelled");
      return { kind: "cancelled" };
    } catch (err) {
      return this.fatal(err instanceof Error ? err : new Error(String(err)));
    } finally {
      await this.closeCapture(capture);
    }
  }

  private async processFrame(
    frame: Frame,
    machine: SessionStateMachine,
    estimator: PresenceEstimator,
  ): Promise<void> {
    this.framesProcessed++;

    let pose: PoseDetection | null;
    try {
      pose = await this.deps.capabilities.poseDetector.detect(frame);
    } catch (err) {
      this.logger.warn(`Pose detection failed on frame ${frame.seq}: ${describeError(err)}`);
      return;
    }

    const sample = estimator.estimate(pose);

    let demographics: DemographicsResult | null = null;
    if (sample !== null && sample.referencePoint !== null && machine.isActivationCandidate(sample)) {
      demographics = await this.analyzeVisitor(frame, sample.referencePoint);
    }

    const transition = machine.step(sample, demographics, this.now());

    switch (transition.type) {
      case "activated":
        this.logger.info(
          `Visitor session started (${transition.demographics.gender}, ${transition.demographics.ageBucket})`,
        );
        break;
      case "deactivated": {
        const { record } = transition;
        this.sessionsCompleted++;
        this.logger.info(
          `Visitor session ${record.id} ended after ${record.dwellMinutes.toFixed(2)} min`,
        );
        await this.deps.reporter.reportSession(record);
        break;
      }
      case "none":
        break;
    }
  }

  /** Face path: pick the visitor's face and classify it. Null when nothing matches. */
  private async analyzeVisitor(frame: Frame, referencePoint: Point): Promise<DemographicsResult | null> {
    const { faceDetector, demographicsClassifier } = this.deps.capabilities;
    try {
      const faces = await faceDetector.detect(frame);
      const face = selectCandidate(faces, referencePoint);
      if (face === null) return null;

      const region = faceCropRegion(face.box, frame.width, frame.height);
      if (region === null) return null;

      const classification = await demographicsClassifier.classify(frame, region);
      if (classification === null) return null;

      return buildDemographics(classification.ageRange, classification.gender);
    } catch (err) {
      this.logger.warn(`Face analysis failed on frame ${frame.seq}: ${describeError(err)}`);
      return null;
    }
  }

  private fatal(error: Error): LoopOutcome {
    this.logger.error(`Pipeline loop aborted: ${error.message}`);
    return { kind: "fatal", error };
  }

  private async closeCapture(capture: CaptureSource): Promise<void> {
    try {
      await capture.close();
    } catch (err) {
      this.logger.warn(`Failed to release capture source: ${describeError(err)}`);
    }
  }

  private notifyExit(outcome: LoopOutcome): void {
    for (const listener of this.exitListeners) {
      try {
        listener(outcome);
      } catch (err) {
        this.logger.error(`Exit listener failed: ${describeError(err)}`);
      }
    }
  }

  private createStateMachine(): SessionStateMachine {
    return new SessionStateMachine({
      standName: this.deps.config.name,
      activationDistance: this.deps.config.activationDistance,
      ...(this.deps.generateSessionId ? { generateId: this.deps.generateSessionId } : {}),
    });
  }
}

/** Register the stand with the backend, then build its runner. */
export async function createPipelineRunner(deps: PipelineRunnerDeps): Promise<PipelineRunner> {
  await deps.reporter.reportStand(deps.config);
  return new PipelineRunner(deps);
}

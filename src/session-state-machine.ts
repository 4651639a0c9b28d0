// Exhibit Stand Engine - Session State Machine
// Turns per-frame presence samples into visitor sessions.
//
// IDLE → ACTIVE:   visitor within activation distance AND a face matched this frame
// ACTIVE → IDLE:   visitor beyond activation distance; emits the SessionRecord
//
// Frames without a presence sample never cause a transition.

import { v4 as uuidv4 } from "uuid";
import { StandState } from "./types.js";
import type {
  DemographicsResult,
  PipelineStateSnapshot,
  PresenceSample,
  SessionRecord,
} from "./types.js";
import { InvalidTransitionError } from "./errors.js";

const MS_PER_MINUTE = 60_000;

const VALID_TRANSITIONS: ReadonlyMap<StandState, StandState> = new Map([
  [StandState.IDLE, StandState.ACTIVE],
  [StandState.ACTIVE, StandState.IDLE],
]);

export type Transition =
  | { type: "none" }
  | { type: "activated"; at: Date; demographics: Readonly<DemographicsResult> }
  | { type: "deactivated"; record: SessionRecord };

export interface SessionStateMachineOptions {
  standName: string;
  /** Meters. */
  activationDistance: number;
  /** Session id generator. Defaults to uuid v4. */
  generateId?: () => string;
}

/** Clamped at zero: the wall clock may be stepped back mid-visit. */
export function dwellMinutes(activatedAt: Date, deactivatedAt: Date): number {
  return Math.max(0, deactivatedAt.getTime() - activatedAt.getTime()) / MS_PER_MINUTE;
}

export class SessionStateMachine {
  private state: StandState = StandState.IDLE;
  private activatedAt: Date | null = null;
  private deactivatedAt: Date | null = null;
  private demographics: Readonly<DemographicsResult> | null = null;
  private readonly options: Required<SessionStateMachineOptions>;

  constructor(options: SessionStateMachineOptions) {
    this.options = { generateId: uuidv4, ...options };
  }

  get current(): StandState {
    return this.state;
  }

  /**
   * True when this frame could activate a session, i.e. it is worth running
   * face detection and demographics on it.
   */
  isActivationCandidate(sample: PresenceSample | null): boolean {
    return (
      this.state === StandState.IDLE &&
      sample !== null &&
      sample.distance !== null &&
      sample.distance <= this.options.activationDistance
    );
  }

  /**
   * Decide the transition for one frame. `demographics` is the match found for
   * this frame, if any; it is only looked at when activating.
   */
  step(
    sample: PresenceSample | null,
    demographics: DemographicsResult | null,
    at: Date,
  ): Transition {
    if (sample === null || sample.distance === null) {
      return { type: "none" };
    }

    if (this.isActivationCandidate(sample)) {
      if (demographics === null) {
        return { type: "none" };
      }
      return this.activate(demographics, at);
    }

    if (this.state === StandState.ACTIVE && sample.distance > this.options.activationDistance) {
      return { type: "deactivated", record: this.deactivate(at) };
    }

    return { type: "none" };
  }

  snapshot(): PipelineStateSnapshot {
    return Object.freeze({
      state: this.state,
      lastActivatedAt: this.activatedAt && new Date(this.activatedAt.getTime()),
      lastDeactivatedAt: this.deactivatedAt && new Date(this.deactivatedAt.getTime()),
      demographics: this.demographics,
    });
  }

  private activate(demographics: DemographicsResult, at: Date): Transition {
    this.transitionTo(StandState.ACTIVE);
    this.activatedAt = at;
    // Frozen copy: later frames of the same visit never alter the identity.
    this.demographics = Object.freeze({ ...demographics });
    return { type: "activated", at, demographics: this.demographics };
  }

  private deactivate(at: Date): SessionRecord {
    const activatedAt = this.activatedAt;
    const demographics = this.demographics;
    if (activatedAt === null || demographics === null) {
      throw new InvalidTransitionError(this.state, StandState.IDLE);
    }

    this.transitionTo(StandState.IDLE);
    this.deactivatedAt = at;
    this.demographics = null;

    return Object.freeze({
      id: this.options.generateId(),
      standName: this.options.standName,
      activatedAt,
      deactivatedAt: at,
      dwellMinutes: dwellMinutes(activatedAt, at),
      demographics,
    });
  }

  private transitionTo(next: StandState): void {
    if (VALID_TRANSITIONS.get(this.state) !== next) {
      throw new InvalidTransitionError(this.state, next);
    }
    this.state = next;
  }
}

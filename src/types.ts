// Exhibit Stand Engine - Shared TypeScript interfaces and types
// Capabilities (capture, pose, faces, demographics) are consumed through the
// interfaces below; everything else in the engine is built on these shapes.

// ─── Stand State Machine ────────────────────────────────────────────────────────

export enum StandState {
  IDLE = "idle",
  ACTIVE = "active",
}

// ─── Geometry ───────────────────────────────────────────────────────────────────

export interface Point {
  x: number;
  y: number;
}

/** Axis-aligned box in frame pixels, (x1, y1) top-left and (x2, y2) bottom-right. */
export interface BoundingBox {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

// ─── Frames & Capture ───────────────────────────────────────────────────────────

export interface Frame {
  /** Opaque image payload, interpreted only by the inference capabilities. */
  data: Buffer;
  width: number;
  height: number;
  seq: number;
  capturedAt: Date;
}

export interface CaptureSource {
  /** Next frame. Rejects with CaptureFailureError when no frame can be read. */
  read(): Promise<Frame>;
  close(): Promise<void>;
}

// ─── Inference Capabilities ─────────────────────────────────────────────────────

export interface PoseKeypoint {
  x: number;
  y: number;
  confidence: number;
}

/** Named keypoints the presence estimator relies on. */
export type PoseKeypointName = "nose" | "leftShoulder" | "rightShoulder";

export interface PoseDetection {
  box: BoundingBox;
  keypoints: Partial<Record<PoseKeypointName, PoseKeypoint>>;
}

export interface PoseDetector {
  /** First detected person, or null when nobody is in the frame. */
  detect(frame: Frame): Promise<PoseDetection | null>;
}

export interface FaceCandidate {
  box: BoundingBox;
  /** Detection confidence in [0, 1]. */
  confidence: number;
}

export interface FaceDetector {
  detect(frame: Frame): Promise<FaceCandidate[]>;
}

export interface DemographicsClassification {
  /** Raw age-range label, e.g. "25-32". */
  ageRange: string;
  gender: string;
}

export interface DemographicsClassifier {
  classify(frame: Frame, region: BoundingBox): Promise<DemographicsClassification | null>;
}

export interface StandCapabilities {
  poseDetector: PoseDetector;
  faceDetector: FaceDetector;
  demographicsClassifier: DemographicsClassifier;
}

// ─── Presence ───────────────────────────────────────────────────────────────────

/** Per-frame presence reading. A missing sample (null) means nobody was detected. */
export interface PresenceSample {
  /** Estimated distance to the visitor in meters. */
  distance: number | null;
  /** Body keypoint used to match a face to the visitor (the nose). */
  referencePoint: Point | null;
}

// ─── Demographics ───────────────────────────────────────────────────────────────

export type AgeBucket = "child" | "young" | "adult" | "senior";

export interface DemographicsResult {
  gender: string;
  ageRange: string;
  ageBucket: AgeBucket;
  /** Midpoint of the age range. */
  age: number;
}

// ─── Sessions ───────────────────────────────────────────────────────────────────

export interface SessionRecord {
  readonly id: string;
  readonly standName: string;
  readonly activatedAt: Date;
  readonly deactivatedAt: Date;
  /** Minutes between activation and deactivation. */
  readonly dwellMinutes: number;
  readonly demographics: Readonly<DemographicsResult>;
}

export interface PipelineStateSnapshot {
  state: StandState;
  lastActivatedAt: Date | null;
  lastDeactivatedAt: Date | null;
  /** Identity of the in-progress session; null while idle. */
  demographics: Readonly<DemographicsResult> | null;
}

export interface PipelineSnapshot extends PipelineStateSnapshot {
  running: boolean;
  slowingDown: boolean;
  framesProcessed: number;
  sessionsCompleted: number;
}

// ─── Configuration ──────────────────────────────────────────────────────────────

/** Registration message the backend knows the stand by. */
export interface StandIdentity {
  name: string;
  description: string;
  section: string;
}

export interface StandConfig extends StandIdentity {
  /** Presence closer than this (meters) counts as "at the stand". */
  activationDistance: number;
  /** Backend base URL, without trailing slash. */
  endpoint: string;
}

// ─── Wire Payloads ──────────────────────────────────────────────────────────────

export interface VisitPayload {
  gender: string;
  group: AgeBucket;
  age_group: string;
  age: number;
  name: string;
  datetime: string;
  time_elapsed: number;
}

// ─── Runner Outcome ─────────────────────────────────────────────────────────────

export type LoopOutcome =
  | { kind: "cancelled" }
  | { kind: "fatal"; error: Error };

export type StopResult = "stopped" | "not_running" | "timed_out";

// Recorded-detections replay.
// Plays back a JSON recording of per-frame detections as a capture source plus
// pose, face and demographics capabilities, so the stand can run end to end
// without a camera or inference models. Running past the last frame is a
// capture failure, like a camera that stops delivering.

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { CaptureFailureError, ConfigError } from "./errors.js";
import type {
  CaptureSource,
  DemographicsClassification,
  FaceCandidate,
  Frame,
  PoseDetection,
  StandCapabilities,
} from "./types.js";

const boxSchema = z.object({
  x1: z.number(),
  y1: z.number(),
  x2: z.number(),
  y2: z.number(),
});

const keypointSchema = z.object({
  x: z.number(),
  y: z.number(),
  confidence: z.number().min(0).max(1),
});

const recordedFrameSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  pose: z
    .object({
      box: boxSchema,
      keypoints: z.object({
        nose: keypointSchema.optional(),
        leftShoulder: keypointSchema.optional(),
        rightShoulder: keypointSchema.optional(),
      }),
    })
    .nullable(),
  faces: z
    .array(z.object({ box: boxSchema, confidence: z.number().min(0).max(1) }))
    .default([]),
  demographics: z
    .object({ ageRange: z.string(), gender: z.string() })
    .nullable()
    .default(null),
  /** Pause before the frame is delivered, simulating the camera's frame interval. */
  delayMs: z.number().int().min(0).default(0),
});

export const recordingSchema = z.object({
  frames: z.array(recordedFrameSchema),
});

export type RecordedFrame = z.infer<typeof recordedFrameSchema>;
export type Recording = z.infer<typeof recordingSchema>;

export function parseRecording(raw: unknown): Recording {
  const result = recordingSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid replay recording: ${detail}`);
  }
  return result.data;
}

export async function loadRecording(filePath: string): Promise<Recording> {
  let text: string;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (err) {
    throw new ConfigError(`Replay recording not found: ${filePath}`, { cause: err });
  }
  try {
    return parseRecording(JSON.parse(text));
  } catch (err) {
    if (err instanceof ConfigError) throw err;
    throw new ConfigError(`Replay recording is not valid JSON: ${filePath}`, { cause: err });
  }
}

export class ReplayCaptureSource implements CaptureSource {
  private readonly recording: Recording;
  private readonly now: () => Date;
  private next = 0;
  private closed = false;

  constructor(recording: Recording, now: () => Date = () => new Date()) {
    this.recording = recording;
    this.now = now;
  }

  async read(): Promise<Frame> {
    if (this.closed) {
      throw new CaptureFailureError("Capture source is closed");
    }
    const seq = this.next;
    const recorded = this.recording.frames[seq];
    if (recorded === undefined) {
      throw new CaptureFailureError(`Recording exhausted after ${seq} frame(s)`);
    }
    this.next++;

    if (recorded.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, recorded.delayMs));
    }

    return {
      data: Buffer.alloc(0),
      width: recorded.width,
      height: recorded.height,
      seq,
      capturedAt: this.now(),
    };
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** Inference capabilities answering from the recorded entry of each frame. */
export function createReplayCapabilities(recording: Recording): StandCapabilities {
  const entry = (frame: Frame): RecordedFrame | undefined => recording.frames[frame.seq];

  return {
    poseDetector: {
      async detect(frame: Frame): Promise<PoseDetection | null> {
        return entry(frame)?.pose ?? null;
      },
    },
    faceDetector: {
      async detect(frame: Frame): Promise<FaceCandidate[]> {
        return entry(frame)?.faces ?? [];
      },
    },
    demographicsClassifier: {
      async classify(frame: Frame): Promise<DemographicsClassification | null> {
        return entry(frame)?.demographics ?? null;
      },
    },
  };
}

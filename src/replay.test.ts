// Unit tests for the recorded-detections replay

import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { fileURLToPath } from "node:url";
import {
  ReplayCaptureSource,
  createReplayCapabilities,
  loadRecording,
  parseRecording,
} from "./replay.js";
import { CaptureFailureError, ConfigError } from "./errors.js";

const RAW = {
  frames: [
    { width: 640, height: 480, pose: null },
    {
      width: 640,
      height: 480,
      pose: {
        box: { x1: 200, y1: 100, x2: 300, y2: 350 },
        keypoints: { nose: { x: 250, y: 130, confidence: 0.9 } },
      },
      faces: [{ box: { x1: 230, y1: 110, x2: 270, y2: 150 }, confidence: 0.93 }],
      demographics: { ageRange: "25-32", gender: "Female" },
    },
  ],
};

describe("parseRecording", () => {
  it("fills defaults for optional fields", () => {
    const recording = parseRecording(RAW);
    expect(recording.frames[0]).toEqual({
      width: 640,
      height: 480,
      pose: null,
      faces: [],
      demographics: null,
      delayMs: 0,
    });
  });

  it("rejects frames with out-of-range confidences", () => {
    const bad = {
      frames: [
        {
          width: 640,
          height: 480,
          pose: null,
          faces: [{ box: { x1: 0, y1: 0, x2: 1, y2: 1 }, confidence: 1.5 }],
        },
      ],
    };
    expect(() => parseRecording(bad)).toThrow(ConfigError);
  });
});

describe("ReplayCaptureSource", () => {
  it("yields recorded frames in order, then fails", async () => {
    const capturedAt = new Date("2025-01-15T10:00:00.000Z");
    const source = new ReplayCaptureSource(parseRecording(RAW), () => capturedAt);

    const first = await source.read();
    const second = await source.read();
    expect([first.seq, second.seq]).toEqual([0, 1]);
    expect(first).toMatchObject({ width: 640, height: 480, capturedAt });

    await expect(source.read()).rejects.toThrow(CaptureFailureError);
    await expect(source.read()).rejects.toThrow("Recording exhausted after 2 frame(s)");
  });

  it("fails once closed", async () => {
    const source = new ReplayCaptureSource(parseRecording(RAW));
    await source.close();
    await expect(source.read()).rejects.toThrow("Capture source is closed");
  });
});

describe("createReplayCapabilities", () => {
  it("answers each capability from the frame's recorded entry", async () => {
    const recording = parseRecording(RAW);
    const source = new ReplayCaptureSource(recording);
    const caps = createReplayCapabilities(recording);

    const empty = await source.read();
    expect(await caps.poseDetector.detect(empty)).toBeNull();
    expect(await caps.faceDetector.detect(empty)).toEqual([]);

    const visitor = await source.read();
    expect(await caps.poseDetector.detect(visitor)).toEqual(RAW.frames[1].pose);
    expect(await caps.faceDetector.detect(visitor)).toEqual(RAW.frames[1].faces);
    expect(
      await caps.demographicsClassifier.classify(visitor, { x1: 0, y1: 0, x2: 10, y2: 10 }),
    ).toEqual({ ageRange: "25-32", gender: "Female" });
  });
});

describe("loadRecording", () => {
  let dir: string | null = null;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = null;
  });

  it("reads a recording from disk", async () => {
    dir = await mkdtemp(join(tmpdir(), "stand-replay-"));
    const file = join(dir, "visit.json");
    await writeFile(file, JSON.stringify(RAW));
    const recording = await loadRecording(file);
    expect(recording.frames).toHaveLength(2);
  });

  it("reports a missing recording as a ConfigError", async () => {
    await expect(loadRecording(join(tmpdir(), "no-such-recording.json"))).rejects.toThrow(
      /Replay recording not found/,
    );
  });

  it("loads the bundled demo recording", async () => {
    const file = fileURLToPath(new URL("../recordings/demo-visit.json", import.meta.url));
    const recording = await loadRecording(file);
    expect(recording.frames).toHaveLength(48);
    expect(recording.frames[0]?.pose).toBeNull();
    expect(recording.frames[17]?.demographics).toEqual({ ageRange: "25-32", gender: "Female" });
  });
});

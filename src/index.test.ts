import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { APP_NAME, APP_VERSION, bootstrapStand, type Stand } from "./index.js";
import { loadRuntimeConfig } from "./config.js";
import { createReplayCapabilities, parseRecording, ReplayCaptureSource } from "./replay.js";

describe("Project setup", () => {
  it("should export app name", () => {
    expect(APP_NAME).toBe("Exhibit Stand Engine");
  });

  it("should export app version", () => {
    expect(APP_VERSION).toBe("0.1.0");
  });
});

describe("bootstrapStand", () => {
  let dir: string;
  let stand: Stand | null = null;
  const fetchMock = vi.fn(async (_input: string, _init: RequestInit) => new Response(null, { status: 200 }));

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "stand-bootstrap-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(async () => {
    if (stand !== null) {
      await stand.supervisor.stop();
      stand = null;
    }
    fetchMock.mockClear();
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("registers the stand and leaves the pipeline stopped", async () => {
    const standPath = join(dir, "stand.json");
    await writeFile(
      standPath,
      JSON.stringify({ config: { name: "Atrium", description: "Entrance hall", section: "Lobby" } }),
    );
    const runtime = loadRuntimeConfig({
      STAND_CONFIG_PATH: standPath,
      STAND_BACKEND_URL: "http://museum-backend.test/",
      STAND_ACTIVATION_DISTANCE: "2",
    });
    const recording = parseRecording({ frames: [] });

    stand = await bootstrapStand(runtime, {
      openCapture: async () => new ReplayCaptureSource(recording),
      capabilities: createReplayCapabilities(recording),
    });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://museum-backend.test/api/stands/push");
    expect(stand.supervisor.getSnapshot().running).toBe(false);
    expect(stand.runner.getSnapshot().state).toBe("idle");
  });
});

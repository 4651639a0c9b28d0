// Exhibit Stand Engine - Entry point
// Loads configuration, registers the stand, wires the pipeline under its
// supervisor and exposes the control server.

import "dotenv/config";
import { pathToFileURL } from "node:url";
import {
  buildStandConfig,
  loadRuntimeConfig,
  loadStandIdentity,
  type RuntimeConfig,
} from "./config.js";
import { ConfigError } from "./errors.js";
import { ReportingSink } from "./reporting-sink.js";
import { createPipelineRunner, type PipelineRunner } from "./pipeline-runner.js";
import { PipelineSupervisor } from "./supervisor.js";
import { createReplayCapabilities, loadRecording, ReplayCaptureSource } from "./replay.js";
import { createAppServer, type AppServer } from "./server.js";
import type { CaptureSource, StandCapabilities } from "./types.js";

export const APP_NAME = "Exhibit Stand Engine";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

export interface StandInputs {
  openCapture: () => Promise<CaptureSource>;
  capabilities: StandCapabilities;
}

export interface Stand {
  runner: PipelineRunner;
  supervisor: PipelineSupervisor;
  server: AppServer;
}

/** Capture and inference backed by the recording named in STAND_REPLAY_PATH. */
async function loadReplayInputs(runtime: RuntimeConfig): Promise<StandInputs> {
  if (runtime.replayPath === null) {
    throw new ConfigError(
      "No capture source configured. Set STAND_REPLAY_PATH to a detections recording.",
    );
  }
  logInit(`Loading replay recording ${runtime.replayPath}...`);
  const recording = await loadRecording(runtime.replayPath);
  logInit(`Replay recording has ${recording.frames.length} frame(s)`);
  return {
    openCapture: async () => new ReplayCaptureSource(recording),
    capabilities: createReplayCapabilities(recording),
  };
}

export async function bootstrapStand(runtime: RuntimeConfig, inputs: StandInputs): Promise<Stand> {
  logInit(`Loading stand config ${runtime.standConfigPath}...`);
  const identity = await loadStandIdentity(runtime.standConfigPath);
  const config = buildStandConfig(identity, runtime);
  logInit(
    `Stand "${config.name}" (${config.section}), activation distance ${config.activationDistance}m`,
  );

  logInit(`Registering stand with ${config.endpoint}...`);
  const reporter = new ReportingSink(config.endpoint);
  const runner = await createPipelineRunner({
    config,
    openCapture: inputs.openCapture,
    capabilities: inputs.capabilities,
    reporter,
  });

  const supervisor = new PipelineSupervisor(runner, {
    policy: {
      maxRestarts: runtime.maxRestarts,
      baseDelayMs: runtime.restartDelayMs,
    },
    onGiveUp: (error) => logFatal(`Pipeline is down: ${error.message}`),
  });

  const server = createAppServer({ control: supervisor });
  return { runner, supervisor, server };
}

async function main(): Promise<void> {
  const runtime = loadRuntimeConfig();
  const inputs = await loadReplayInputs(runtime);
  const stand = await bootstrapStand(runtime, inputs);

  await stand.server.listen(runtime.port);
  stand.supervisor.start();
  logInit("Pipeline: capture → pose → presence → face match → demographics → session → backend");
  logInit("Ready");

  const shutdown = (signal: string) => {
    logInit(`${signal} received, stopping pipeline...`);
    stand.supervisor
      .stop()
      .then((result) => {
        logInit(`Pipeline ${result}`);
        return stand.server.close();
      })
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logFatal(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  main().catch((err: unknown) => {
    logFatal(err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
}

// Exhibit Stand Engine - Configuration loading
// Stand identity comes from a JSON file; runtime knobs come from the
// environment (populated from .env by the entry point).

import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { StandConfig, StandIdentity } from "./types.js";

export const DEFAULT_ACTIVATION_DISTANCE = 1.5;
export const DEFAULT_BACKEND_URL = "http://localhost:8000";
export const DEFAULT_CONTROL_PORT = 5050;
export const DEFAULT_MAX_RESTARTS = 3;
export const DEFAULT_RESTART_DELAY_MS = 1000;

const standFileSchema = z.object({
  config: z.object({
    name: z.string().min(1),
    description: z.string(),
    section: z.string(),
  }),
});

export type StandFile = z.infer<typeof standFileSchema>;

export interface RuntimeConfig {
  standConfigPath: string;
  backendUrl: string;
  activationDistance: number;
  port: number;
  replayPath: string | null;
  maxRestarts: number;
  restartDelayMs: number;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/** Validate a parsed stand file and return the identity it declares. */
export function parseStandFile(raw: unknown): StandIdentity {
  const result = standFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid stand config: ${formatIssues(result.error)}`);
  }
  return { ...result.data.config };
}

export async function loadStandIdentity(filePath: string): Promise<StandIdentity> {
  const resolved = path.resolve(filePath);
  let text: string;
  try {
    text = await readFile(resolved, "utf-8");
  } catch (err) {
    throw new ConfigError(`Stand config not found: ${resolved}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Stand config is not valid JSON: ${resolved}`, { cause: err });
  }
  return parseStandFile(raw);
}

const envSchema = z.object({
  STAND_CONFIG_PATH: z.string().min(1, "STAND_CONFIG_PATH is not set"),
  STAND_BACKEND_URL: z.string().url().default(DEFAULT_BACKEND_URL),
  STAND_ACTIVATION_DISTANCE: z.coerce.number().positive().default(DEFAULT_ACTIVATION_DISTANCE),
  PORT: z.coerce.number().int().min(0).max(65535).default(DEFAULT_CONTROL_PORT),
  STAND_REPLAY_PATH: z.string().min(1).optional(),
  STAND_MAX_RESTARTS: z.coerce.number().int().min(0).default(DEFAULT_MAX_RESTARTS),
  STAND_RESTART_DELAY_MS: z.coerce.number().int().min(0).default(DEFAULT_RESTART_DELAY_MS),
});

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  // Empty strings in .env mean "not set".
  const defined = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );
  const result = envSchema.safeParse(defined);
  if (!result.success) {
    throw new ConfigError(`Invalid environment: ${formatIssues(result.error)}`);
  }
  const e = result.data;
  return {
    standConfigPath: e.STAND_CONFIG_PATH,
    backendUrl: e.STAND_BACKEND_URL,
    activationDistance: e.STAND_ACTIVATION_DISTANCE,
    port: e.PORT,
    replayPath: e.STAND_REPLAY_PATH ?? null,
    maxRestarts: e.STAND_MAX_RESTARTS,
    restartDelayMs: e.STAND_RESTART_DELAY_MS,
  };
}

export function buildStandConfig(identity: StandIdentity, runtime: RuntimeConfig): StandConfig {
  return Object.freeze({
    ...identity,
    activationDistance: runtime.activationDistance,
    endpoint: runtime.backendUrl.replace(/\/+$/, ""),
  });
}

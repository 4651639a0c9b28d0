/**
 * ReportingSink: pushes stand registration and completed visits to the backend.
 *
 * Delivery is at-most-once: every call is a single POST with a fixed timeout.
 * Transport errors, timeouts and non-2xx answers are logged and the event is
 * dropped. Methods resolve to whether the backend accepted the event and never
 * reject, so the caller's loop is not affected by backend outages.
 */

import type { SessionRecord, StandIdentity, VisitPayload } from "./types.js";
import { createConsoleLogger, type Logger } from "./logger.js";

export const STANDS_PATH = "/api/stands/push";
export const VISITS_PATH = "/api/visits/push";
export const REPORT_TIMEOUT_MS = 10_000;

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface ReportingSinkDeps {
  fetch?: FetchFn;
  logger?: Logger;
  timeoutMs?: number;
}

const pad = (value: number, width = 2) => String(value).padStart(width, "0");

/**
 * Wall-clock time of the stand without a zone suffix, e.g.
 * "2025-01-15T10:00:05.000". The backend buckets visits by calendar day in
 * the museum's local time.
 */
export function toLocalIsoString(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}` +
    `.${pad(date.getMilliseconds(), 3)}`
  );
}

export function toVisitPayload(record: SessionRecord): VisitPayload {
  return {
    gender: record.demographics.gender,
    group: record.demographics.ageBucket,
    age_group: record.demographics.ageRange,
    age: record.demographics.age,
    name: record.standName,
    datetime: toLocalIsoString(record.activatedAt),
    time_elapsed: record.dwellMinutes,
  };
}

export function toStandPayload(identity: StandIdentity): StandIdentity {
  return {
    name: identity.name,
    description: identity.description,
    section: identity.section,
  };
}

export class ReportingSink {
  private readonly endpoint: string;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;
  private readonly timeoutMs: number;

  constructor(endpoint: string, deps: ReportingSinkDeps = {}) {
    this.endpoint = endpoint.replace(/\/+$/, "");
    this.fetchFn = deps.fetch ?? ((input, init) => fetch(input, init));
    this.logger = deps.logger ?? createConsoleLogger("ReportingSink");
    this.timeoutMs = deps.timeoutMs ?? REPORT_TIMEOUT_MS;
  }

  /** Register the stand with the backend. Called once per pipeline. */
  reportStand(identity: StandIdentity): Promise<boolean> {
    return this.post(STANDS_PATH, toStandPayload(identity), `stand "${identity.name}"`);
  }

  /** Push one completed visit. */
  reportSession(record: SessionRecord): Promise<boolean> {
    return this.post(VISITS_PATH, toVisitPayload(record), `session ${record.id}`);
  }

  private async post(path: string, body: object, label: string): Promise<boolean> {
    const url = `${this.endpoint}${path}`;
    try {
      const response = await this.fetchFn(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "User-Agent": "ExhibitStand/0.1",
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        this.logger.warn(`Dropped ${label}: ${url} answered HTTP ${response.status}`);
        return false;
      }

      this.logger.info(`Reported ${label} to ${url}`);
      return true;
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Dropped ${label}: ${url} failed (${errorMessage})`);
      return false;
    }
  }
}

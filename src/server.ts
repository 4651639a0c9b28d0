// Exhibit Stand Engine - Local control server
// Exposes the pipeline's control surface (start / stop / status) to the
// stand's operator tooling over HTTP. Binds to loopback by default.

import express, { type Express } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import type { PipelineSnapshot, StopResult } from "./types.js";
import { createConsoleLogger, type Logger } from "./logger.js";

/** What the control server needs from the pipeline side. */
export interface PipelineControl {
  start(): boolean;
  stop(): Promise<StopResult>;
  getSnapshot(): PipelineSnapshot;
}

export interface CreateServerOptions {
  control: PipelineControl;
  /** Custom logger. Defaults to console-based logger. */
  logger?: Logger;
  /** Interface to bind. Defaults to 127.0.0.1. */
  host?: string;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  close(): Promise<void>;
}

export function serializeSnapshot(snapshot: PipelineSnapshot): Record<string, unknown> {
  return {
    state: snapshot.state,
    running: snapshot.running,
    slowingDown: snapshot.slowingDown,
    lastActivatedAt: snapshot.lastActivatedAt?.toISOString() ?? null,
    lastDeactivatedAt: snapshot.lastDeactivatedAt?.toISOString() ?? null,
    demographics: snapshot.demographics,
    framesProcessed: snapshot.framesProcessed,
    sessionsCompleted: snapshot.sessionsCompleted,
  };
}

/**
 * Creates the Express app and HTTP server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const {
    control,
    logger = createConsoleLogger("ControlServer"),
    host = "127.0.0.1",
  } = options;

  const app = express();
  const httpServer = createServer(app);

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/api/status", (_req, res) => {
    res.json(serializeSnapshot(control.getSnapshot()));
  });

  app.post("/api/pipeline/start", (_req, res) => {
    const started = control.start();
    logger.info(started ? "Pipeline start requested" : "Pipeline already running");
    res.json({ started });
  });

  app.post("/api/pipeline/stop", (_req, res, next) => {
    control
      .stop()
      .then((result) => {
        logger.info(`Pipeline stop requested: ${result}`);
        res.json({ result });
      })
      .catch(next);
  });

  return {
    app,
    httpServer,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, host, () => {
          httpServer.off("error", reject);
          logger.info(`Control server listening on http://${host}:${port}`);
          resolve();
        });
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    },
  };
}

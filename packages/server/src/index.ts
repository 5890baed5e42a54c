/**
 * Main server entry point
 */

import { resolve } from "node:path";
import { Hono } from "hono";
import { serve } from "@hono/node-server";
import { logger } from "hono/logger";
import { cors } from "hono/cors";
import pino, { type Logger } from "pino";
import {
  ENDPOINTS,
  ERROR_CODES,
  SHUTDOWN_GRACE_PERIOD_MS,
  type DeskRelayConfig,
} from "@deskrelay/shared";
import { SessionRegistry } from "./services/session-registry.js";
import { SessionSweeper } from "./services/session-sweeper.js";
import { FrameProducer } from "./services/frame-producer.js";
import { InputAuthorizer } from "./services/input-authorizer.js";
import { StaffAuthenticator } from "./services/staff-auth.js";
import { SIGNING_KEY_FILES } from "./services/crypto.js";
import { NutScreenSource } from "./capture/screen-source.js";
import { SharpFrameEncoder } from "./capture/encoder.js";
import { NutInputDevice } from "./input/nut-device.js";
import { RemoteControlGateway } from "./channel/gateway.js";
import { setupChannelEndpoint } from "./channel/websocket.js";
import { setupSessionEndpoints } from "./endpoints/sessions.js";
import { setupStatusEndpoints } from "./endpoints/status.js";
import { requireStaff, type AppEnv } from "./endpoints/staff-auth.js";

export { SessionRegistry, toSnapshot } from "./services/session-registry.js";
export { SessionSweeper } from "./services/session-sweeper.js";
export { FrameProducer } from "./services/frame-producer.js";
export { InputAuthorizer, scaleCoordinate } from "./services/input-authorizer.js";
export { StaffAuthenticator } from "./services/staff-auth.js";
export { RemoteControlGateway, type ChannelPeer } from "./channel/gateway.js";
export type { ScreenSource, RawScreenImage } from "./capture/screen-source.js";
export type { FrameEncoder } from "./capture/encoder.js";
export type { InputDevice } from "./input/device.js";

export interface ServerConfig {
  config: DeskRelayConfig;
  port: number;
  bindAddress: string;
  keyPath: string;
  logLevel: string;
}

export interface AppDependencies {
  registry: SessionRegistry;
  frames: FrameProducer;
  input: InputAuthorizer;
  staffAuth: StaffAuthenticator;
  log: Logger;
}

/**
 * HTTP surface without the channel, so it can be driven through app.request()
 */
export function createApp(deps: AppDependencies): Hono<AppEnv> {
  const { registry, frames, input, staffAuth, log } = deps;
  const app = new Hono<AppEnv>();

  app.use("*", cors({ origin: "*" }));

  // Request logging
  app.use("*", logger((message) => log.info(message)));

  app.get(ENDPOINTS.HEALTH, (c) => {
    return c.json({
      name: "deskrelay",
      status: "running",
      endpoints: {
        sessions: `POST ${ENDPOINTS.SESSIONS}`,
        channel: `GET ${ENDPOINTS.CHANNEL}`,
      },
    });
  });

  // Everything except health and the channel is staff-only
  const staffOnly = requireStaff(staffAuth);
  app.use(ENDPOINTS.SESSIONS, staffOnly);
  app.use(`${ENDPOINTS.SESSIONS}/*`, staffOnly);
  app.use("/work-items/*", staffOnly);
  app.use("/api/*", staffOnly);

  setupSessionEndpoints(app, registry, log);
  setupStatusEndpoints(app, registry, frames, input);

  app.onError((err, c) => {
    log.error({ err, path: c.req.path }, "Unhandled request error");
    return c.json({ error: "Internal server error" }, ERROR_CODES.INTERNAL);
  });

  return app;
}

export async function startServer(serverConfig: ServerConfig) {
  const { config } = serverConfig;

  // Logger
  const log = pino({
    level: serverConfig.logLevel,
    transport: {
      target: "pino-pretty",
      options: { colorize: true },
    },
  });

  // Initialize services
  const staffAuth = await StaffAuthenticator.fromKeyFiles(
    resolve(serverConfig.keyPath, SIGNING_KEY_FILES.PUBLIC)
  );

  const registry = new SessionRegistry(
    {
      ttlMs: config.session.ttlMs,
      maxAuthFailures: config.session.maxAuthFailures,
    },
    log
  );

  const frames = new FrameProducer(
    new NutScreenSource(),
    new SharpFrameEncoder(),
    {
      fps: config.capture.fps,
      quality: config.capture.quality,
      maxWidth: config.capture.maxWidth,
    },
    log
  );

  const input = new InputAuthorizer(
    new NutInputDevice({ typingDelayMs: config.input.typingDelayMs }),
    log
  );
  await input.initialize();

  const gateway = new RemoteControlGateway(registry, frames, input, log, {
    pushFrames: config.capture.pushFrames,
  });

  const sweeper = new SessionSweeper(
    registry,
    { intervalMs: config.session.sweepIntervalMs },
    log
  );
  sweeper.start();

  // Setup endpoints
  const app = createApp({ registry, frames, input, staffAuth, log });
  const injectWebSocket = setupChannelEndpoint(app, gateway, log);

  // Start server
  const server = serve(
    {
      fetch: app.fetch,
      port: serverConfig.port,
      hostname: serverConfig.bindAddress,
    },
    (info) => {
      log.info(`Server listening on http://${info.address}:${info.port}`);
    }
  );
  injectWebSocket(server);

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`${signal} received, shutting down gracefully...`);

    sweeper.stop();
    gateway.close();
    await frames.stop();

    server.close(() => {
      log.info("Server closed");
      process.exit(0);
    });

    // Force close after grace period
    setTimeout(() => {
      log.warn("Forcing shutdown after grace period");
      process.exit(1);
    }, SHUTDOWN_GRACE_PERIOD_MS).unref();
  };

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        log.error({ err }, "Shutdown failed");
        process.exit(1);
      });
    });
  }

  return server;
}

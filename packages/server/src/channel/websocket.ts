/**
 * WebSocket binding for the remote-control channel
 */

import type { Hono } from "hono";
import { createNodeWebSocket } from "@hono/node-ws";
import type { Logger } from "pino";
import { ENDPOINTS, type ConnectionId } from "@deskrelay/shared";
import type { RemoteControlGateway } from "./gateway.js";
import type { AppEnv } from "../endpoints/staff-auth.js";

export type InjectWebSocket = ReturnType<typeof createNodeWebSocket>["injectWebSocket"];

/**
 * Mounts `GET /ws` on the app. The returned function must be handed the HTTP
 * server once it exists so upgrades reach Hono.
 */
export function setupChannelEndpoint(
  app: Hono<AppEnv>,
  gateway: RemoteControlGateway,
  log: Logger
): InjectWebSocket {
  const { upgradeWebSocket, injectWebSocket } = createNodeWebSocket({ app });

  app.get(
    ENDPOINTS.CHANNEL,
    upgradeWebSocket(() => {
      let connectionId: ConnectionId | null = null;

      return {
        onOpen(_event, ws) {
          connectionId = gateway.connect({
            send: (event) => ws.send(JSON.stringify(event)),
          });
        },

        onMessage(event, ws) {
          if (!connectionId) return;
          if (typeof event.data !== "string") {
            ws.send(
              JSON.stringify({
                type: "error",
                code: "invalid_message",
                message: "Binary frames are not supported",
              })
            );
            return;
          }
          gateway.handleMessage(connectionId, event.data).catch((err: unknown) => {
            log.error({ err, connectionId }, "Channel message failed");
          });
        },

        onClose() {
          if (connectionId) {
            gateway.disconnect(connectionId);
            connectionId = null;
          }
        },

        onError(event) {
          log.warn({ connectionId, event: event.type }, "Channel socket error");
        },
      };
    })
  );

  return injectWebSocket;
}

import type { IncomingMessage, Server } from "http";
import { WebSocket, WebSocketServer, type RawData } from "ws";
import type { AppContext } from "../context.js";
import { isAppError } from "../errors.js";
import { requireProjectRole } from "../services/access.service.js";
import { verifyToken } from "../services/auth.service.js";
import { newId, nowIso } from "../util/ids.js";
import { getLogger } from "../util/logger.js";
import type { ClientConnection, ConnectionRegistry } from "./connection-registry.js";
import {
  projectChannel,
  userChannel,
  type OutboundMessage,
  type PubSub,
} from "./pubsub.js";

const logger = getLogger("gateway");

export const UNAUTHORIZED_CLOSE_CODE = 4401;

export interface GatewayOptions {
  /** Path for WebSocket upgrades. */
  path?: string;
  /** Heartbeat interval in ms. */
  heartbeatInterval?: number;
}

type ClientMessage =
  | { type: "join_project"; projectId: string }
  | { type: "leave_project"; projectId: string }
  | { type: "user_typing"; projectId: string; taskId: string; isTyping: boolean }
  | { type: "ping" };

/**
 * WebSocket front for the pub/sub hub. Each socket is one `ClientConnection`
 * subscribed to its user's channel plus whichever project channels it joins.
 */
export class RealtimeGateway {
  private wss: WebSocketServer | null = null;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private readonly sockets = new Map<string, { socket: WebSocket; isAlive: boolean }>();

  constructor(
    private readonly ctx: AppContext,
    private readonly pubsub: PubSub,
    private readonly registry: ConnectionRegistry,
    private readonly options: GatewayOptions = {},
  ) {}

  attach(server: Server): void {
    this.wss = new WebSocketServer({ server, path: this.options.path ?? "/ws" });

    this.wss.on("connection", (socket, request) => {
      this.handleConnection(socket, request);
    });

    this.wss.on("error", (error) => {
      logger.error({ err: error }, "WebSocket server error");
    });

    this.startHeartbeat();
    logger.info({ path: this.options.path ?? "/ws" }, "Realtime gateway attached");
  }

  handleConnection(socket: WebSocket, request: IncomingMessage): void {
    const userId = authenticateUpgrade(request);
    if (userId === null) {
      socket.close(UNAUTHORIZED_CLOSE_CODE, "Unauthorized");
      return;
    }

    const connection = this.openSession(userId, (message) => {
      if (socket.readyState === WebSocket.OPEN) {
        socket.send(JSON.stringify(message));
      }
    });
    const entry = { socket, isAlive: true };
    this.sockets.set(connection.id, entry);

    socket.on("message", (data: RawData) => {
      this.handleMessage(connection, rawDataToString(data)).catch((error: unknown) => {
        logger.error({ err: error, connectionId: connection.id }, "Failed to handle client message");
        connection.send({ type: "error", message: "Internal server error" });
      });
    });

    socket.on("pong", () => {
      entry.isAlive = true;
    });

    socket.on("close", (code) => {
      logger.info({ connectionId: connection.id, userId, code }, "Client disconnected");
      this.closeSession(connection);
    });

    socket.on("error", (error) => {
      logger.warn({ err: error, connectionId: connection.id }, "Client socket error");
    });
  }

  /** Registers an authenticated connection and subscribes it to its user channel. */
  openSession(userId: string, send: (message: OutboundMessage) => void): ClientConnection {
    const connection = this.registry.register(newId(), userId, (message) => {
      if (message.type === "removed_from_project" && typeof message.projectId === "string") {
        this.revokeProject(connection, message.projectId);
      }
      send(message);
    });
    this.pubsub.subscribe(connection, userChannel(userId));
    connection.send({ type: "connected", userId });
    logger.info({ connectionId: connection.id, userId }, "Client connected");
    return connection;
  }

  async handleMessage(connection: ClientConnection, raw: string): Promise<void> {
    const message = parseClientMessage(raw);
    if (message === null) {
      connection.send({ type: "error", message: "Invalid message" });
      return;
    }

    switch (message.type) {
      case "join_project":
        await this.joinProject(connection, message.projectId);
        return;
      case "leave_project":
        this.leaveProject(connection, message.projectId);
        return;
      case "user_typing":
        this.relayTyping(connection, message.projectId, message.taskId, message.isTyping);
        return;
      case "ping":
        connection.send({ type: "pong" });
        return;
    }
  }

  closeSession(connection: ClientConnection): void {
    if (!this.registry.get(connection.id)) return;

    const joined = [...connection.projects];
    connection.projects.clear();
    this.pubsub.unsubscribeAll(connection);
    this.registry.remove(connection.id);
    this.sockets.delete(connection.id);

    for (const projectId of joined) {
      this.announceOffline(connection.userId, projectId);
    }
  }

  async close(): Promise<void> {
    this.stopHeartbeat();

    for (const { socket } of this.sockets.values()) {
      socket.close(1001, "Server shutting down");
    }
    for (const connection of this.registry.all()) {
      this.closeSession(connection);
    }

    const wss = this.wss;
    this.wss = null;
    if (!wss) return;

    await new Promise<void>((resolve, reject) => {
      wss.close((error) => (error ? reject(error) : resolve()));
    });
  }

  private async joinProject(connection: ClientConnection, projectId: string): Promise<void> {
    try {
      await this.ctx.store.run((repos) =>
        requireProjectRole(repos, connection.userId, projectId, "viewer"),
      );
    } catch (error) {
      if (!isAppError(error)) throw error;
      connection.send({ type: "error", message: error.message, code: error.code });
      return;
    }

    const alreadyJoined = connection.projects.has(projectId);
    this.pubsub.subscribe(connection, projectChannel(projectId));
    connection.projects.add(projectId);

    connection.send({
      type: "joined_project",
      projectId,
      onlineUsers: this.registry.onlineUsers(projectId),
    });
    if (!alreadyJoined) {
      this.ctx.broadcaster.emitProject(projectId, "user_presence", {
        actorId: connection.userId,
        userId: connection.userId,
        status: "online",
      });
    }
  }

  private leaveProject(connection: ClientConnection, projectId: string): void {
    const wasJoined = connection.projects.delete(projectId);
    this.pubsub.unsubscribe(connection, projectChannel(projectId));
    connection.send({ type: "left_project", projectId });

    if (wasJoined) {
      this.announceOffline(connection.userId, projectId);
    }
  }

  /** Typing status goes to everyone in the project room except the sender. */
  private relayTyping(
    connection: ClientConnection,
    projectId: string,
    taskId: string,
    isTyping: boolean,
  ): void {
    if (!connection.projects.has(projectId)) {
      connection.send({ type: "error", message: "Join the project first" });
      return;
    }

    this.pubsub.publish(
      projectChannel(projectId),
      {
        type: "user_typing_status",
        actorId: connection.userId,
        userId: connection.userId,
        projectId,
        taskId,
        isTyping,
        timestamp: nowIso(),
      },
      { exclude: connection.id },
    );
  }

  /** Drops a project channel once the user has lost access to the project. */
  private revokeProject(connection: ClientConnection, projectId: string): void {
    const wasJoined = connection.projects.delete(projectId);
    this.pubsub.unsubscribe(connection, projectChannel(projectId));
    if (wasJoined) {
      logger.info({ connectionId: connection.id, projectId }, "Project access revoked");
      this.announceOffline(connection.userId, projectId);
    }
  }

  /** Offline is only announced once the user's last joined connection is gone. */
  private announceOffline(userId: string, projectId: string): void {
    if (this.registry.onlineUsers(projectId).includes(userId)) return;
    this.ctx.broadcaster.emitProject(projectId, "user_presence", {
      actorId: userId,
      userId,
      status: "offline",
    });
  }

  private startHeartbeat(): void {
    const interval = this.options.heartbeatInterval ?? 30000;

    this.heartbeatTimer = setInterval(() => {
      for (const [connectionId, entry] of this.sockets) {
        if (!entry.isAlive) {
          logger.info({ connectionId }, "Client heartbeat timeout");
          entry.socket.terminate();
          continue;
        }
        entry.isAlive = false;
        entry.socket.ping();
      }
    }, interval);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }
}

function authenticateUpgrade(request: IncomingMessage): string | null {
  const url = new URL(request.url ?? "/", "http://localhost");
  const token = url.searchParams.get("token");
  if (!token) return null;

  try {
    return verifyToken(token).userId;
  } catch (error) {
    logger.debug({ err: error }, "Rejected WebSocket token");
    return null;
  }
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

export function parseClientMessage(raw: string): ClientMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null || !("type" in parsed)) {
    return null;
  }

  const type = parsed.type;
  switch (type) {
    case "ping":
      return { type: "ping" };
    case "join_project":
    case "leave_project": {
      const projectId = "projectId" in parsed ? parsed.projectId : undefined;
      if (typeof projectId !== "string" || !projectId) return null;
      return { type, projectId };
    }
    case "user_typing": {
      const projectId = "projectId" in parsed ? parsed.projectId : undefined;
      const taskId = "taskId" in parsed ? parsed.taskId : undefined;
      const isTyping = "isTyping" in parsed ? parsed.isTyping : false;
      if (typeof projectId !== "string" || !projectId) return null;
      if (typeof taskId !== "string" || !taskId) return null;
      if (typeof isTyping !== "boolean") return null;
      return { type, projectId, taskId, isTyping };
    }
    default:
      return null;
  }
}

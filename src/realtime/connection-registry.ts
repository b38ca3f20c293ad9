import type { OutboundMessage, Subscriber } from "./pubsub.js";

export interface ClientConnection extends Subscriber {
  userId: string;
  connectedAt: Date;
  /** Projects whose channel this connection has joined. */
  projects: Set<string>;
}

/**
 * Which socket belongs to which user. Created once per gateway and emptied
 * when the gateway shuts down.
 */
export class ConnectionRegistry {
  private readonly connections = new Map<string, ClientConnection>();

  register(
    id: string,
    userId: string,
    send: (message: OutboundMessage) => void,
  ): ClientConnection {
    const connection: ClientConnection = {
      id,
      userId,
      connectedAt: new Date(),
      projects: new Set(),
      send,
    };
    this.connections.set(id, connection);
    return connection;
  }

  remove(id: string): ClientConnection | null {
    const connection = this.connections.get(id) ?? null;
    this.connections.delete(id);
    return connection;
  }

  get(id: string): ClientConnection | null {
    return this.connections.get(id) ?? null;
  }

  forUser(userId: string): ClientConnection[] {
    return [...this.connections.values()].filter((connection) => connection.userId === userId);
  }

  /** Distinct users with at least one connection joined to the project. */
  onlineUsers(projectId: string): string[] {
    const users = new Set<string>();
    for (const connection of this.connections.values()) {
      if (connection.projects.has(projectId)) {
        users.add(connection.userId);
      }
    }
    return [...users];
  }

  all(): ClientConnection[] {
    return [...this.connections.values()];
  }

  get size(): number {
    return this.connections.size;
  }

  clear(): void {
    this.connections.clear();
  }
}

import { getLogger } from "../util/logger.js";

const logger = getLogger("pubsub");

export type EventType =
  | "task_created"
  | "task_updated"
  | "task_status_changed"
  | "task_assigned"
  | "task_assigned_to_you"
  | "task_deleted"
  | "comment_added"
  | "comment_updated"
  | "comment_deleted"
  | "member_added"
  | "added_to_project"
  | "member_role_updated"
  | "member_removed"
  | "removed_from_project"
  | "project_updated"
  | "project_archived"
  | "tag_created"
  | "tag_updated"
  | "tag_deleted"
  | "user_presence"
  | "user_typing_status";

export interface EventPayload {
  actorId: string;
  [key: string]: unknown;
}

export interface RealtimeEvent extends EventPayload {
  type: EventType;
  timestamp: string;
}

/** Anything pushed down a client connection: broadcast events and direct replies. */
export interface OutboundMessage {
  type: string;
  [key: string]: unknown;
}

export interface Subscriber {
  readonly id: string;
  send(message: OutboundMessage): void;
}

export interface PublishOptions {
  /** Subscriber id that does not receive this event. */
  exclude?: string;
}

export interface PubSub {
  subscribe(subscriber: Subscriber, channel: string): void;
  unsubscribe(subscriber: Subscriber, channel: string): void;
  /** Drops every subscription held by the subscriber. */
  unsubscribeAll(subscriber: Subscriber): void;
  /** Returns the number of subscribers the event was handed to. */
  publish(channel: string, event: RealtimeEvent, options?: PublishOptions): number;
  subscriberCount(channel: string): number;
}

export function projectChannel(projectId: string): string {
  return `project:${projectId}`;
}

export function userChannel(userId: string): string {
  return `user:${userId}`;
}

/**
 * In-process room registry. Delivery is at most once per subscriber per
 * publish; a subscriber that throws is skipped and the rest still receive
 * the event.
 */
export class RoomHub implements PubSub {
  private readonly rooms = new Map<string, Map<string, Subscriber>>();

  subscribe(subscriber: Subscriber, channel: string): void {
    let room = this.rooms.get(channel);
    if (!room) {
      room = new Map();
      this.rooms.set(channel, room);
    }
    room.set(subscriber.id, subscriber);
  }

  unsubscribe(subscriber: Subscriber, channel: string): void {
    const room = this.rooms.get(channel);
    if (!room) return;

    room.delete(subscriber.id);
    if (room.size === 0) {
      this.rooms.delete(channel);
    }
  }

  unsubscribeAll(subscriber: Subscriber): void {
    for (const channel of [...this.rooms.keys()]) {
      this.unsubscribe(subscriber, channel);
    }
  }

  publish(channel: string, event: RealtimeEvent, options: PublishOptions = {}): number {
    const room = this.rooms.get(channel);
    if (!room) return 0;

    let delivered = 0;
    for (const subscriber of [...room.values()]) {
      if (subscriber.id === options.exclude) continue;
      try {
        subscriber.send(event);
        delivered++;
      } catch (error) {
        logger.warn(
          { err: error, channel, subscriberId: subscriber.id, eventType: event.type },
          "Dropping event for subscriber",
        );
      }
    }
    return delivered;
  }

  subscriberCount(channel: string): number {
    return this.rooms.get(channel)?.size ?? 0;
  }

  channelsOf(subscriber: Subscriber): string[] {
    const channels: string[] = [];
    for (const [channel, room] of this.rooms) {
      if (room.has(subscriber.id)) channels.push(channel);
    }
    return channels;
  }
}

import { getLogger } from "../util/logger.js";
import {
  projectChannel,
  userChannel,
  type EventPayload,
  type EventType,
  type PubSub,
  type RealtimeEvent,
} from "./pubsub.js";

const logger = getLogger("broadcaster");

export interface Broadcaster {
  emitProject(projectId: string, type: EventType, payload: EventPayload): void;
  emitUser(userId: string, type: EventType, payload: EventPayload): void;
}

/**
 * Fire-and-forget fan-out onto `project:<id>` and `user:<id>` channels.
 * Nothing here throws back into the caller: the mutation that produced the
 * event has already committed.
 */
export class ChannelBroadcaster implements Broadcaster {
  constructor(
    private readonly pubsub: PubSub,
    private readonly now: () => Date = () => new Date(),
  ) {}

  emitProject(projectId: string, type: EventType, payload: EventPayload): void {
    this.publish(projectChannel(projectId), { ...payload, projectId, type, timestamp: this.timestamp() });
  }

  emitUser(userId: string, type: EventType, payload: EventPayload): void {
    this.publish(userChannel(userId), { ...payload, type, timestamp: this.timestamp() });
  }

  private publish(channel: string, event: RealtimeEvent): void {
    try {
      const delivered = this.pubsub.publish(channel, event);
      logger.debug({ channel, eventType: event.type, delivered }, "Broadcast event");
    } catch (error) {
      logger.error({ err: error, channel, eventType: event.type }, "Broadcast failed");
    }
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}

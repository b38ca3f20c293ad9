import type { AppContext } from "../context.js";
import type { Repositories } from "../db/store.js";
import type { Broadcaster } from "../realtime/broadcaster.js";
import type { EventPayload, EventType } from "../realtime/pubsub.js";

interface PendingEvent {
  scope: "project" | "user";
  targetId: string;
  type: EventType;
  payload: EventPayload;
}

/** Events queued during a transaction, published only once it has committed. */
export class EventBatch {
  private readonly pending: PendingEvent[] = [];

  project(projectId: string, type: EventType, payload: EventPayload): void {
    this.pending.push({ scope: "project", targetId: projectId, type, payload });
  }

  user(userId: string, type: EventType, payload: EventPayload): void {
    this.pending.push({ scope: "user", targetId: userId, type, payload });
  }

  get size(): number {
    return this.pending.length;
  }

  flush(broadcaster: Broadcaster): void {
    for (const event of this.pending.splice(0)) {
      if (event.scope === "project") {
        broadcaster.emitProject(event.targetId, event.type, event.payload);
      } else {
        broadcaster.emitUser(event.targetId, event.type, event.payload);
      }
    }
  }
}

/**
 * Runs one mutating operation: access checks, writes and activity entries go
 * through `repos` inside a single transaction, and the queued events go out
 * after the commit. A throw anywhere before the commit completes discards
 * the events.
 */
export async function commitMutation<T>(
  ctx: AppContext,
  work: (repos: Repositories, events: EventBatch) => Promise<T>,
): Promise<T> {
  const events = new EventBatch();
  const result = await ctx.store.transaction((repos) => work(repos, events));
  events.flush(ctx.broadcaster);
  return result;
}

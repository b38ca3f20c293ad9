import type { Store } from "./db/store.js";
import type { Broadcaster } from "./realtime/broadcaster.js";

/** Collaborators every service call runs against. */
export interface AppContext {
  store: Store;
  broadcaster: Broadcaster;
}

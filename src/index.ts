import { createServer } from "http";
import { createApp } from "./app.js";
import { env } from "./config/env.js";
import type { AppContext } from "./context.js";
import { pool } from "./db/pool.js";
import { MysqlStore } from "./db/mysql-store.js";
import { ChannelBroadcaster } from "./realtime/broadcaster.js";
import { ConnectionRegistry } from "./realtime/connection-registry.js";
import { RealtimeGateway } from "./realtime/gateway.js";
import { RoomHub } from "./realtime/pubsub.js";
import { getLogger } from "./util/logger.js";

const logger = getLogger("server");

const hub = new RoomHub();
const ctx: AppContext = {
  store: new MysqlStore(pool),
  broadcaster: new ChannelBroadcaster(hub),
};

const server = createServer(createApp(ctx));
const gateway = new RealtimeGateway(ctx, hub, new ConnectionRegistry());
gateway.attach(server);

server.listen(env.PORT, () => {
  logger.info({ port: env.PORT }, "Server listening");
});

async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, "Shutting down");
  await gateway.close();
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
  await pool.end();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, "Shutdown failed");
        process.exit(1);
      },
    );
  });
}

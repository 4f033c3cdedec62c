/**
 * Express server - sweep API.
 */

import { createApp } from "./app.js";
import { getBaseConfig } from "../src/config.js";
import { closeDb } from "../src/lib/db/index.js";
import { getPersistenceDriver } from "../src/lib/persistence/driver.js";

const PORT = parseInt(process.env.PORT ?? "3000", 10);

async function start() {
  // fail fast on a bad config file or SWEEP_* value
  getBaseConfig();
  const app = createApp();
  const server = app.listen(PORT, "0.0.0.0", () => {
    console.log(`[Server] running at http://0.0.0.0:${PORT} (persistence=${getPersistenceDriver()})`);
  });

  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down`);
    server.close(() => {
      closeDb().then(
        () => process.exit(0),
        (err: unknown) => {
          console.error("[Server] failed to close database pool:", err);
          process.exit(1);
        }
      );
    });
  };
  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));
}
start().catch((e) => {
  console.error("[Server] failed to start:", e);
  process.exit(1);
});

#!/usr/bin/env node
import { loadConfig } from "./config.js";
import { startServer } from "./server.js";

const config = loadConfig();

startServer(config)
  .then((running) => {
    const shutdown = () => {
      running.close().then(
        () => process.exit(0),
        (err: unknown) => {
          console.error(err instanceof Error ? err.message : "shutdown failed");
          process.exit(1);
        }
      );
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  })
  .catch((err) => {
    const message = err instanceof Error ? err.message : "startup failed";
    console.error(message);
    process.exit(1);
  });

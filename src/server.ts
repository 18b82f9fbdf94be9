import { createApp } from "./app";
import { loadConfig } from "./config/rateLimit";
import { logEvent, setLogLevel } from "./utils/logger";

const config = loadConfig();
setLogLevel(config.logLevel);

const { app, stores } = createApp(config);
stores.forEach((store) => store.start());

const server = app.listen(config.port, () => {
  logEvent({
    event: "server.started",
    message: `Listening on port ${config.port}`,
    meta: { algorithm: config.algorithm, defaultBudget: config.defaultBudget },
  });
});

function shutdown(signal: string) {
  logEvent({ event: "server.stopping", message: `Received ${signal}` });
  stores.forEach((store) => store.stop());
  server.close((err) => {
    if (err) {
      logEvent({ level: "error", event: "server.close_failed", message: err.message });
      process.exitCode = 1;
    }
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

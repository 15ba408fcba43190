import { createApp } from "./app";
import { loadConfig } from "./config";
import { log, logError } from "./log";

(async () => {
  const config = loadConfig();
  const { server } = await createApp(config);

  server.listen({
    port: config.port,
    host: config.host,
  }, () => {
    log(`API server running on port ${config.port}`);
    log(`Default container: ${config.defaultContainer.name}`);
  });
})().catch((error: unknown) => {
  logError("Failed to start server", error);
  process.exit(1);
});

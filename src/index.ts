import { buildApplication } from "./composition/container";
import { initializeLogging } from "./runtime/logging";
import { LOG_FILE } from "./env";

async function main() {
  const loggingHandle = initializeLogging(LOG_FILE);
  if (loggingHandle.logPath) {
    console.log(`Logging output to ${loggingHandle.logPath}`);
  }

  const app = await buildApplication();
  await app.start();

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    try {
      await app.shutdown();
    } catch (err) {
      console.warn("Shutdown failed:", err);
    } finally {
      await loggingHandle.shutdown();
    }
  };

  const exit = () => {
    console.log("\nExiting…");
    shutdown().finally(() => process.exit(0));
  };

  process.on("SIGINT", exit);
  process.on("SIGTERM", exit);
  process.on("SIGHUP", () => {
    app.reload().catch((err) => {
      console.error("Reload failed:", err);
    });
  });
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});

#!/usr/bin/env node
import { buildApplication } from "./composition/container";
import { resolveEnvironment } from "./env";
import { initializeLogging } from "./runtime/logging";
import { USAGE, UsageError } from "./runtime/commandLine";
import { describeError } from "./domain/errors";

async function main(): Promise<number> {
  const environment = resolveEnvironment();
  const loggingHandle = initializeLogging(environment.LOG_FILE);
  if (loggingHandle.logPath) {
    console.log(`Logging output to ${loggingHandle.logPath}`);
  }

  let shuttingDown = false;
  const shutdown = async (app: { shutdown(): Promise<void> }) => {
    if (shuttingDown) return;
    shuttingDown = true;
    try {
      await app.shutdown();
    } catch (err) {
      console.warn("Shutdown failed:", describeError(err));
    }
  };

  try {
    const app = buildApplication(environment);

    process.once("SIGINT", () => {
      console.log("\nExiting…");
      shutdown(app).catch((err: unknown) => console.error(err));
    });

    try {
      await app.start();
    } finally {
      await shutdown(app);
    }
    return 0;
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(err.message);
      console.error(USAGE);
      return 2;
    }
    console.error(describeError(err));
    return 1;
  } finally {
    loggingHandle.shutdown();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  }
);

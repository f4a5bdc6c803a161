#!/usr/bin/env node
import { buildServer, type ServerInstance } from "./composition/container";
import { initializeLogging } from "./runtime/logging";
import { loadConfig, resolveServerSettings } from "./config";
import { ConsoleLogger, parseLogLevel } from "./adapters/sys/ConsoleLogger";
import { describeError } from "./domain/errors";
import {
  ASSEMBLYAI_API_KEY,
  ASSEMBLYAI_LANGUAGE,
  CLI_ARGS,
  LOG_LEVEL,
  TRANSCRIBE_HOST,
  TRANSCRIBE_PORT,
} from "./env";

async function main() {
  const loggingHandle = initializeLogging(CLI_ARGS.logFile, { program: "transcribe-server" });
  const logger = new ConsoleLogger("server", parseLogLevel(LOG_LEVEL));
  if (loggingHandle.logPath) {
    logger.info("Logging output to file.", { logPath: loggingHandle.logPath });
  }

  const { config, path: configPath } = loadConfig(CLI_ARGS.configPath);
  if (configPath) {
    logger.info("Loaded config.", { configPath });
  }

  let app: ServerInstance;
  try {
    const settings = resolveServerSettings(config, {
      args: CLI_ARGS,
      env: {
        apiKey: ASSEMBLYAI_API_KEY,
        languageCode: ASSEMBLYAI_LANGUAGE,
        host: TRANSCRIBE_HOST,
        port: TRANSCRIBE_PORT,
      },
    });
    app = buildServer(settings, logger);
    await app.start();
  } catch (err) {
    logger.error("Server failed to start.", { detail: describeError(err) });
    await loggingHandle.shutdown();
    process.exit(1);
  }

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    try {
      await app.shutdown();
    } catch (err) {
      logger.warn("Shutdown failed.", { detail: describeError(err) });
    }
  };

  const onSignal = () => {
    logger.info("Received shutdown signal; exiting.");
    shutdown()
      .then(() => loggingHandle.shutdown())
      .finally(() => process.exit(0));
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});

#!/usr/bin/env node
import readline from "readline";
import { buildClient, type ClientInstance } from "./composition/container";
import { initializeLogging } from "./runtime/logging";
import { loadConfig, resolveClientSettings } from "./config";
import { ConsoleLogger, parseLogLevel } from "./adapters/sys/ConsoleLogger";
import { describeError } from "./domain/errors";
import { AUDIO_DEVICE, CLI_ARGS, LOG_LEVEL, TRANSCRIBE_SERVER_URL } from "./env";

async function main(): Promise<number> {
  const loggingHandle = initializeLogging(CLI_ARGS.logFile, { program: "transcribe-client" });
  const logger = new ConsoleLogger("client", parseLogLevel(LOG_LEVEL));

  const { config, path: configPath } = loadConfig(CLI_ARGS.configPath);
  if (configPath) {
    logger.info("Loaded config.", { configPath });
  }

  let app: ClientInstance;
  try {
    const settings = resolveClientSettings(config, {
      args: CLI_ARGS,
      env: { serverUrl: TRANSCRIBE_SERVER_URL, audioDevice: AUDIO_DEVICE },
    });
    app = await buildClient(settings, logger, process.stdout);
  } catch (err) {
    logger.error("Client failed to start.", { detail: describeError(err) });
    await loggingHandle.shutdown();
    return 1;
  }

  console.log("\n=== Live transcription ===");
  console.log("Type 's' + Enter to start/stop recording");
  console.log("Type 'q' + Enter to quit\n");

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: "command> " });

  const finished = new Promise<void>((resolve) => {
    rl.on("close", () => resolve());
  });

  app.onServerClosed((reason) => {
    logger.warn("Server closed the connection.", { reason });
    rl.close();
  });

  rl.on("line", (line) => {
    const command = line.trim().toLowerCase();
    if (command === "q") {
      rl.close();
      return;
    }
    if (command === "s") {
      app.recorder.toggle().catch((err) => {
        logger.error("Failed to toggle recording.", { detail: describeError(err) });
      });
    }
    rl.prompt();
  });

  try {
    await app.start();
  } catch (err) {
    logger.error("Failed to start recording.", { detail: describeError(err) });
  }
  rl.prompt();

  await finished;
  try {
    await app.shutdown();
  } catch (err) {
    logger.warn("Shutdown failed.", { detail: describeError(err) });
  }
  logger.info("Disconnected.");
  await loggingHandle.shutdown();
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });

#!/usr/bin/env node
import { buildBatch } from "./composition/container";
import { initializeLogging } from "./runtime/logging";
import { loadConfig, resolveBatchSettings, type BatchSettings } from "./config";
import { ConsoleLogger, parseLogLevel } from "./adapters/sys/ConsoleLogger";
import { describeError } from "./domain/errors";
import { ASSEMBLYAI_API_KEY, ASSEMBLYAI_LANGUAGE, CLI_ARGS, LOG_LEVEL } from "./env";

async function main(): Promise<number> {
  const loggingHandle = initializeLogging(CLI_ARGS.logFile, { program: "transcribe-batch" });
  const logger = new ConsoleLogger("batch", parseLogLevel(LOG_LEVEL));

  try {
    const { config, path: configPath } = loadConfig(CLI_ARGS.configPath);
    if (configPath) {
      logger.info("Loaded config.", { configPath });
    }

    let settings: BatchSettings;
    try {
      settings = resolveBatchSettings(config, {
        args: CLI_ARGS,
        env: { apiKey: ASSEMBLYAI_API_KEY, languageCode: ASSEMBLYAI_LANGUAGE },
      });
    } catch (err) {
      logger.error("Invalid batch arguments.", { detail: describeError(err) });
      return 1;
    }

    logger.info("Batch started.", { input: settings.input, outputDir: settings.outputDir });
    const summary = await buildBatch(settings, logger).processPath(settings.input, settings.outputDir);
    logger.info(`Found ${summary.found} audio file(s); transcribed ${summary.succeeded}.`);
    return 0;
  } finally {
    await loggingHandle.shutdown();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });

import fs from "fs";
import path from "path";
import { ConfigError } from "./domain/errors";
import { DEFAULT_DISPATCH_THRESHOLD_BYTES } from "./domain/session/SessionBuffer";
import { DEFAULT_RELAY_CAPACITY } from "./app/FrameRelay";
import { DEFAULT_SAMPLE_RATE, isRecord } from "./shared/protocol";

export interface ServerFileConfig {
  host?: string;
  port?: number;
  thresholdBytes?: number;
  defaultSampleRate?: number;
}

export interface ClientFileConfig {
  serverUrl?: string;
  frameLength?: number;
  queueCapacity?: number;
  audioDevice?: string;
}

export interface BatchFileConfig {
  outputDir?: string;
}

export interface AppConfig {
  server?: ServerFileConfig;
  client?: ClientFileConfig;
  batch?: BatchFileConfig;
}

export interface LoadedConfig {
  config: AppConfig;
  path?: string;
}

const DEFAULT_CONFIG_FILENAMES = ["transcribe.config.json"];

export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 8081;
export const DEFAULT_SERVER_URL = "ws://127.0.0.1:8081";
/** 100ms at 16kHz. */
export const DEFAULT_FRAME_LENGTH = 1600;
export const DEFAULT_OUTPUT_DIR = "results";

export function loadConfig(configPath?: string): LoadedConfig {
  const searchPaths = configPath
    ? [configPath]
    : DEFAULT_CONFIG_FILENAMES.map((name) => path.resolve(process.cwd(), name));

  for (const candidate of searchPaths) {
    try {
      const resolved = path.resolve(candidate);
      if (!fs.existsSync(resolved)) continue;
      const raw = fs.readFileSync(resolved, "utf8");
      const parsed: unknown = JSON.parse(raw);
      if (!isRecord(parsed)) {
        console.warn(`Ignoring config ${resolved}: expected a JSON object.`);
        continue;
      }
      return {
        config: {
          server: normalizeServer(parsed.server),
          client: normalizeClient(parsed.client),
          batch: normalizeBatch(parsed.batch),
        },
        path: resolved,
      };
    } catch (err) {
      console.warn(`Failed to load config from ${candidate}:`, err);
    }
  }

  return { config: {} };
}

export interface ServerSettings {
  host: string;
  port: number;
  thresholdBytes: number;
  defaultSampleRate: number;
  apiKey: string;
  languageCode?: string;
}

export interface ClientSettings {
  serverUrl: string;
  frameLength: number;
  queueCapacity: number;
  audioDevice?: string;
}

export interface BatchSettings {
  input: string;
  outputDir: string;
  apiKey: string;
  languageCode?: string;
}

export interface SettingsSources {
  args: {
    host?: string;
    port?: string;
    server?: string;
    input?: string;
    output?: string;
    flags?: string[];
    unknown?: string[];
  };
  env: {
    apiKey?: string;
    languageCode?: string;
    host?: string;
    port?: string;
    serverUrl?: string;
    audioDevice?: string;
  };
}

const COMMON_FLAGS = ["--config", "--log-file"];
const SERVER_FLAGS = [...COMMON_FLAGS, "--host", "--port"];
const CLIENT_FLAGS = [...COMMON_FLAGS, "--server"];
const BATCH_FLAGS = [...COMMON_FLAGS, "--input", "--output"];

export function resolveServerSettings(config: AppConfig, sources: SettingsSources): ServerSettings {
  const problems = checkArguments(sources.args, SERVER_FLAGS);
  const settings: ServerSettings = {
    host: sources.args.host ?? config.server?.host ?? sources.env.host ?? DEFAULT_HOST,
    port: toInteger(sources.args.port ?? config.server?.port ?? sources.env.port, DEFAULT_PORT, "port", problems),
    thresholdBytes: config.server?.thresholdBytes ?? DEFAULT_DISPATCH_THRESHOLD_BYTES,
    defaultSampleRate: config.server?.defaultSampleRate ?? DEFAULT_SAMPLE_RATE,
    apiKey: sources.env.apiKey ?? "",
    languageCode: sources.env.languageCode,
  };

  if (!settings.host.trim()) problems.push("host must not be empty.");
  if (settings.port < 1 || settings.port > 65535) problems.push("port must be between 1 and 65535.");
  if (!Number.isInteger(settings.thresholdBytes) || settings.thresholdBytes < 2 || settings.thresholdBytes % 2 !== 0) {
    problems.push("server.thresholdBytes must be a positive even integer.");
  }
  checkSampleRate(settings.defaultSampleRate, "server.defaultSampleRate", problems);
  if (!settings.apiKey) problems.push("ASSEMBLYAI_API_KEY must be set.");

  if (problems.length) throw new ConfigError(problems);
  return settings;
}

export function resolveClientSettings(config: AppConfig, sources: SettingsSources): ClientSettings {
  const problems = checkArguments(sources.args, CLIENT_FLAGS);
  const settings: ClientSettings = {
    serverUrl: sources.args.server ?? config.client?.serverUrl ?? sources.env.serverUrl ?? DEFAULT_SERVER_URL,
    frameLength: config.client?.frameLength ?? DEFAULT_FRAME_LENGTH,
    queueCapacity: config.client?.queueCapacity ?? DEFAULT_RELAY_CAPACITY,
    audioDevice: config.client?.audioDevice ?? sources.env.audioDevice,
  };

  if (!/^wss?:\/\/.+/.test(settings.serverUrl)) {
    problems.push(`server URL must start with ws:// or wss:// (got "${settings.serverUrl}").`);
  }
  if (!Number.isInteger(settings.frameLength) || settings.frameLength < 1) {
    problems.push("client.frameLength must be a positive integer.");
  }
  if (!Number.isInteger(settings.queueCapacity) || settings.queueCapacity < 1) {
    problems.push("client.queueCapacity must be a positive integer.");
  }

  if (problems.length) throw new ConfigError(problems);
  return settings;
}

export function resolveBatchSettings(config: AppConfig, sources: SettingsSources): BatchSettings {
  const problems = checkArguments(sources.args, BATCH_FLAGS);
  const input = sources.args.input ?? "";
  const settings: BatchSettings = {
    input,
    outputDir: sources.args.output ?? config.batch?.outputDir ?? DEFAULT_OUTPUT_DIR,
    apiKey: sources.env.apiKey ?? "",
    languageCode: sources.env.languageCode,
  };

  if (!input) {
    problems.push("an input file or directory is required (-i/--input).");
  } else if (!fs.existsSync(input)) {
    problems.push(`input path does not exist: ${input}`);
  }
  if (!settings.outputDir.trim()) problems.push("output directory must not be empty.");
  if (!settings.apiKey) problems.push("ASSEMBLYAI_API_KEY must be set.");

  if (problems.length) throw new ConfigError(problems);
  return settings;
}

function checkArguments(args: SettingsSources["args"], accepted: string[]): string[] {
  const problems: string[] = [];
  for (const flag of args.flags ?? []) {
    if (!accepted.includes(flag)) {
      problems.push(`${flag} is not an option of this program (accepted: ${accepted.join(", ")}).`);
    }
  }
  for (const arg of args.unknown ?? []) {
    problems.push(`unrecognized argument: ${arg}`);
  }
  return problems;
}

function checkSampleRate(value: number, name: string, problems: string[]) {
  if (!Number.isInteger(value) || value < 8000 || value > 48000) {
    problems.push(`${name} must be an integer between 8000 and 48000.`);
  }
}

function toInteger(value: string | number | undefined, fallback: number, name: string, problems: string[]): number {
  if (value === undefined || value === "") return fallback;
  const parsed = typeof value === "number" ? value : Number(value);
  if (!Number.isInteger(parsed)) {
    problems.push(`${name} must be an integer (got "${value}").`);
    return fallback;
  }
  return parsed;
}

function normalizeServer(value: unknown): ServerFileConfig | undefined {
  if (!isRecord(value)) return undefined;
  return {
    host: asString(value.host),
    port: asNumber(value.port),
    thresholdBytes: asNumber(value.thresholdBytes),
    defaultSampleRate: asNumber(value.defaultSampleRate),
  };
}

function normalizeClient(value: unknown): ClientFileConfig | undefined {
  if (!isRecord(value)) return undefined;
  return {
    serverUrl: asString(value.serverUrl),
    frameLength: asNumber(value.frameLength),
    queueCapacity: asNumber(value.queueCapacity),
    audioDevice: asString(value.audioDevice),
  };
}

function normalizeBatch(value: unknown): BatchFileConfig | undefined {
  if (!isRecord(value)) return undefined;
  return { outputDir: asString(value.outputDir) };
}

function asString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function asNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

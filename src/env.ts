import { config } from "dotenv";

config();

export const ASSEMBLYAI_API_KEY = process.env.ASSEMBLYAI_API_KEY ?? "";
export const ASSEMBLYAI_LANGUAGE = process.env.ASSEMBLYAI_LANGUAGE || undefined;
export const AUDIO_DEVICE = process.env.AUDIO_DEVICE || undefined;
export const LOG_LEVEL = process.env.LOG_LEVEL || "info";
export const TRANSCRIBE_HOST = process.env.TRANSCRIBE_HOST || undefined;
export const TRANSCRIBE_PORT = process.env.TRANSCRIBE_PORT || undefined;
export const TRANSCRIBE_SERVER_URL = process.env.TRANSCRIBE_SERVER_URL || undefined;

export interface CliArgs {
  configPath?: string;
  logFile?: string;
  host?: string;
  port?: string;
  server?: string;
  input?: string;
  output?: string;
  /** Long names of the recognized flags that were given, e.g. "--input" for "-i". */
  flags: string[];
  unknown: string[];
}

export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { flags: [], unknown: [] };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = (flag: string) => {
      args.flags.push(flag);
      return i + 1 < argv.length ? argv[++i] : undefined;
    };
    switch (arg) {
      case "--config":
        args.configPath = next(arg);
        break;
      case "--log-file":
        args.logFile = next(arg);
        break;
      case "--host":
        args.host = next(arg);
        break;
      case "--port":
        args.port = next(arg);
        break;
      case "--server":
        args.server = next(arg);
        break;
      case "-i":
      case "--input":
        args.input = next("--input");
        break;
      case "-o":
      case "--output":
        args.output = next("--output");
        break;
      default:
        args.unknown.push(arg);
        break;
    }
  }

  return args;
}

export const CLI_ARGS = parseCliArgs(process.argv.slice(2));

import type { CliOverrides } from "./config/load.js";
import type { SinkId } from "./notify/types.js";

const SINK_FLAGS = new Map<string, SinkId>([
  ["--notify", "desktop"],
  ["--sound", "sound"],
  ["--popup", "popup"],
  ["--visual", "table"],
]);

export interface ParsedArgs {
  configPath?: string;
  overrides: CliOverrides;
  positional: string[];
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith("--")) throw new Error(`Missing value for ${flag}`);
  return value;
}

function requireSeconds(flag: string, value: string | undefined): number {
  const n = Number(requireValue(flag, value));
  if (!Number.isFinite(n) || n <= 0) throw new Error(`${flag} must be a positive number of seconds`);
  return n;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = { overrides: {}, positional: [] };
  const sinks: SinkId[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const sink = SINK_FLAGS.get(arg);
    if (sink) {
      sinks.push(sink);
      continue;
    }
    switch (arg) {
      case "--interval":
        parsed.overrides.intervalSec = requireSeconds(arg, argv[++i]);
        break;
      case "--cooldown":
        parsed.overrides.cooldownSec = requireSeconds(arg, argv[++i]);
        break;
      case "--url":
        parsed.overrides.url = requireValue(arg, argv[++i]);
        break;
      case "--file":
        parsed.overrides.file = requireValue(arg, argv[++i]);
        break;
      case "--out":
        parsed.overrides.outDir = requireValue(arg, argv[++i]);
        break;
      case "--config":
        parsed.configPath = requireValue(arg, argv[++i]);
        break;
      default:
        if (arg.startsWith("--")) throw new Error(`Unknown option: ${arg}`);
        parsed.positional.push(arg);
    }
  }

  if (sinks.length > 0) parsed.overrides.sinks = sinks;
  return parsed;
}

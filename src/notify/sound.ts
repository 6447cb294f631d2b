import { execFile } from "node:child_process";
import { createLogger } from "../utils/logger.js";
import type { RenderedSummary } from "../watch/summary.js";
import type { Sink } from "./types.js";

const logger = createLogger("SoundSink");

export interface Command {
  file: string;
  args: string[];
}

/** Player commands tried in order for a platform. */
export function soundCommands(platform: NodeJS.Platform): Command[] {
  switch (platform) {
    case "darwin":
      return [{ file: "afplay", args: ["/System/Library/Sounds/Glass.aiff"] }];
    case "linux":
      return [
        { file: "paplay", args: ["/usr/share/sounds/freedesktop/stereo/complete.oga"] },
        { file: "aplay", args: ["-q", "/usr/share/sounds/alsa/Front_Center.wav"] },
      ];
    case "win32":
      return [
        {
          file: "powershell",
          args: ["-NoProfile", "-Command", "[System.Media.SystemSounds]::Exclamation.Play()"],
        },
      ];
    default:
      return [];
  }
}

export type CommandRunner = (cmd: Command, signal: AbortSignal) => Promise<void>;

export const execRunner: CommandRunner = (cmd, signal) =>
  new Promise((resolve, reject) => {
    execFile(cmd.file, cmd.args, { signal }, (err) => {
      if (err) reject(err);
      else resolve();
    });
  });

export interface SoundSinkOptions {
  platform?: NodeJS.Platform;
  run?: CommandRunner;
  /** Receives the terminal bell when no player works. */
  bell?: NodeJS.WritableStream;
}

/** Plays the platform alert sound; falls back to the terminal bell. */
export class SoundSink implements Sink {
  readonly id = "sound" as const;
  private readonly commands: Command[];
  private readonly run: CommandRunner;
  private readonly bell: NodeJS.WritableStream;

  constructor(opts: SoundSinkOptions = {}) {
    this.commands = soundCommands(opts.platform ?? process.platform);
    this.run = opts.run ?? execRunner;
    this.bell = opts.bell ?? process.stdout;
  }

  async notify(_summary: RenderedSummary, signal: AbortSignal): Promise<void> {
    for (const cmd of this.commands) {
      if (signal.aborted) return;
      try {
        await this.run(cmd, signal);
        return;
      } catch (err) {
        logger.debug({ player: cmd.file, err: String(err) }, "Sound player unavailable");
      }
    }
    // Already reported as timed out; stay quiet.
    if (signal.aborted) return;
    this.bell.write("\u0007");
  }
}

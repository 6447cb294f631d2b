import { spawn } from "node:child_process";
import { createLogger } from "../utils/logger.js";
import { formatPlainTable, type RenderedSummary } from "../watch/summary.js";
import type { Sink } from "./types.js";

const logger = createLogger("PopupSink");

export interface DialogCommand {
  file: string;
  args: string[];
  env?: Record<string, string>;
}

/**
 * Dialog invocation per platform. Title and body travel as argv or env, never
 * interpolated into a script.
 */
export function dialogCommand(platform: NodeJS.Platform, title: string, body: string): DialogCommand | null {
  switch (platform) {
    case "darwin":
      return {
        file: "osascript",
        args: [
          "-e", "on run argv",
          "-e", 'display dialog (item 2 of argv) with title (item 1 of argv) buttons {"Close"} default button 1',
          "-e", "end run",
          title,
          body,
        ],
      };
    case "linux":
      return { file: "zenity", args: ["--info", "--no-markup", "--width=650", `--title=${title}`, `--text=${body}`] };
    case "win32":
      return {
        file: "powershell",
        args: [
          "-NoProfile",
          "-Command",
          "Add-Type -AssemblyName PresentationFramework; " +
            "[System.Windows.MessageBox]::Show($env:POPUP_BODY, $env:POPUP_TITLE) | Out-Null",
        ],
        env: { POPUP_TITLE: title, POPUP_BODY: body },
      };
    default:
      return null;
  }
}

export type DialogLauncher = (cmd: DialogCommand) => Promise<void>;

/**
 * Starts the dialog as a detached process and resolves once it has spawned.
 * The dialog's own lifetime (until the user closes it) is not awaited.
 */
export const detachedLauncher: DialogLauncher = (cmd) =>
  new Promise((resolve, reject) => {
    const child = spawn(cmd.file, cmd.args, {
      detached: true,
      stdio: "ignore",
      env: cmd.env ? { ...process.env, ...cmd.env } : process.env,
    });
    child.once("error", reject);
    child.once("spawn", () => {
      child.unref();
      resolve();
    });
  });

export function popupBody(summary: RenderedSummary): string {
  return [summary.headline, "", "Current positions:", "", formatPlainTable(summary)].join("\n");
}

/** Modal dialog with the full position table. */
export class PopupSink implements Sink {
  readonly id = "popup" as const;
  private readonly platform: NodeJS.Platform;

  constructor(
    private readonly launch: DialogLauncher = detachedLauncher,
    platform?: NodeJS.Platform
  ) {
    this.platform = platform ?? process.platform;
  }

  async notify(summary: RenderedSummary): Promise<void> {
    const cmd = dialogCommand(this.platform, summary.title, popupBody(summary));
    if (!cmd) throw new Error(`No dialog program for platform ${this.platform}`);
    await this.launch(cmd);
    logger.debug({ program: cmd.file }, "Popup opened");
  }
}

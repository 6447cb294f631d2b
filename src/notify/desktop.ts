import notifier from "node-notifier";
import type { RenderedSummary } from "../watch/summary.js";
import type { Sink } from "./types.js";

export interface DesktopMessage {
  title: string;
  message: string;
  /** Seconds the toast stays up. */
  timeout: number;
}

export type DesktopBackend = (msg: DesktopMessage) => Promise<void>;

export const nodeNotifierBackend: DesktopBackend = (msg) =>
  new Promise((resolve, reject) => {
    notifier.notify({ title: msg.title, message: msg.message, timeout: msg.timeout }, (err) => {
      if (err) reject(err);
      else resolve();
    });
  });

/** OS notification centre toast: title plus the one-line headline. */
export class DesktopSink implements Sink {
  readonly id = "desktop" as const;

  constructor(private readonly backend: DesktopBackend = nodeNotifierBackend) {}

  async notify(summary: RenderedSummary): Promise<void> {
    await this.backend({ title: summary.title, message: summary.headline, timeout: 5 });
  }
}

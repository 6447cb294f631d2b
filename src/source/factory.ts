import type { SourceConfig } from "../config/schema.js";
import { FileSource } from "./fileSource.js";
import { HttpPageSource } from "./httpPage.js";
import type { PageSource } from "./types.js";

export function createSource(cfg: SourceConfig): PageSource {
  const section = { marker: cfg.sectionMarker, endMarkers: cfg.sectionEndMarkers };
  switch (cfg.kind) {
    case "http":
      return new HttpPageSource({ url: cfg.url, timeoutMs: cfg.timeoutMs, userAgent: cfg.userAgent, ...section });
    case "file":
      return new FileSource(cfg.path, section);
  }
}

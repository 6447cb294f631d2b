import { DesktopSink } from "./desktop.js";
import { PopupSink } from "./popup.js";
import { SoundSink } from "./sound.js";
import { TableSink } from "./table.js";
import { DEFAULT_SINKS, type Sink, type SinkId } from "./types.js";

/** Enabled sink ids, de-duplicated in first-seen order; none means the default set. */
export function resolveSinkIds(enabled: readonly SinkId[]): SinkId[] {
  const ids = [...new Set(enabled)];
  return ids.length > 0 ? ids : [...DEFAULT_SINKS];
}

export function createSink(id: SinkId): Sink {
  switch (id) {
    case "desktop":
      return new DesktopSink();
    case "sound":
      return new SoundSink();
    case "popup":
      return new PopupSink();
    case "table":
      return new TableSink();
  }
}

export function createSinks(enabled: readonly SinkId[]): Sink[] {
  return resolveSinkIds(enabled).map(createSink);
}

import { readFile } from "node:fs/promises";
import { extractSection, htmlToText, type SectionOptions } from "./htmlText.js";
import { FetchError, type PageSource, type RawSnapshot } from "./types.js";

/**
 * Reads a page dump from disk on every poll. Pairs with any external renderer
 * that writes the page's HTML or text to a file.
 */
export class FileSource implements PageSource {
  readonly origin: string;

  constructor(
    private readonly path: string,
    private readonly section: SectionOptions
  ) {
    this.origin = path;
  }

  async fetch(): Promise<RawSnapshot> {
    let content: string;
    try {
      content = await readFile(this.path, "utf-8");
    } catch (err) {
      throw new FetchError(`Cannot read ${this.path}: ${String(err)}`, { cause: err });
    }
    return {
      text: extractSection(htmlToText(content), this.section),
      capturedAt: new Date(),
      origin: this.origin,
    };
  }
}

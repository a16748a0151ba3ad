import { mkdir, writeFile } from "fs/promises";
import type { TickerResult } from "@core-types";
import { sanitizeDeep } from "@vol-core/sanitize";
import { pathInside } from "../config/configManager";

/** JSON text of an artifact; every value passes the numeric sanitizer first. */
export function serializeArtifact(result: TickerResult): string {
  return JSON.stringify(sanitizeDeep(result));
}

export interface ArtifactSink {
  /** Persist one result; resolves to where it went. */
  write(symbol: string, result: TickerResult): Promise<string>;
}

/** Writes one `<symbol>.json` per processed ticker. */
export class ArtifactWriter implements ArtifactSink {
  constructor(private readonly dir: string) {}

  async write(symbol: string, result: TickerResult, filename = `${symbol}.json`): Promise<string> {
    const file = pathInside(this.dir, filename);
    if (file === null) {
      throw new Error(`refusing to write ${filename} outside ${this.dir}`);
    }
    await mkdir(this.dir, { recursive: true });
    await writeFile(file, serializeArtifact(result), "utf-8");
    return file;
  }
}

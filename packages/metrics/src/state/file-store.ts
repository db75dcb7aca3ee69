import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { homedir } from "node:os";
import { createLogger } from "@statbeacon/logger";
import type { MetricsState, StateStore, StoredState } from "../types.js";
import { fromDocument, toDocument } from "./document.js";

const log = createLogger("metrics:state:file");

/** Default location of the reporting state document. */
export const DEFAULT_STATE_PATH = join(homedir(), ".statbeacon", "metrics.json");

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * JSON document on disk, e.g. `{"guid":"…","opt-out":false,"debug":false}`.
 *
 * Operators may edit the file while the host runs; every load re-reads it.
 * Saves go to a temporary file that is renamed over the document, so a load
 * never observes a partial write.
 */
export class FileStateStore implements StateStore {
  readonly path: string;

  constructor(path?: string) {
    this.path = path ?? DEFAULT_STATE_PATH;
  }

  async load(): Promise<StoredState> {
    let text: string;
    try {
      text = await readFile(this.path, "utf8");
    } catch (err) {
      if (isMissingFile(err)) {
        log.debug(`load: ${this.path} does not exist yet`);
        return {};
      }
      throw err;
    }
    return fromDocument(JSON.parse(text));
  }

  async save(state: MetricsState): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tmpPath = `${this.path}.${process.pid}.tmp`;
    await writeFile(tmpPath, JSON.stringify(toDocument(state), null, 2) + "\n", "utf8");
    await rename(tmpPath, this.path);
    log.debug(`save: ${this.path} optOut=${state.optOut}`);
  }
}

/**
 * Durable pointer to the last played clip, used by replay
 */

import { mkdir, readFile, rename, writeFile } from "fs/promises";
import path from "path";
import { z } from "zod";
import { getDb } from "../firebase/admin";
import { Mutex } from "../lib/mutex";
import { StateStoreError } from "../lib/errors";
import { defaultLogger, type ILogger } from "../lib/logger";

export const LAST_CLIP_KEY = "lastClipUrl";

export interface LastClipStore {
  get(): Promise<string | null>;
  set(url: string): Promise<void>;
}

const StateFileSchema = z.record(z.string(), z.unknown());

function toError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

/**
 * JSON key-value file; writes go through a temp file and rename
 */
export class FileLastClipStore implements LastClipStore {
  private readonly lock = new Mutex();
  private readonly logger: ILogger;

  constructor(
    private readonly filePath: string,
    logger: ILogger = defaultLogger
  ) {
    this.logger = logger.child({ component: "state", backend: "file" });
  }

  get(): Promise<string | null> {
    return this.lock.runExclusive(async () => {
      const state = await this.read();
      const value = state[LAST_CLIP_KEY];
      return typeof value === "string" && value.length > 0 ? value : null;
    });
  }

  set(url: string): Promise<void> {
    return this.lock.runExclusive(async () => {
      const state = await this.read();
      state[LAST_CLIP_KEY] = url;

      const tempPath = `${this.filePath}.tmp`;
      try {
        await mkdir(path.dirname(this.filePath), { recursive: true });
        await writeFile(tempPath, JSON.stringify(state, null, 2), "utf8");
        await rename(tempPath, this.filePath);
      } catch (error) {
        throw new StateStoreError("write", "could not persist state file", { filePath: this.filePath }, toError(error));
      }
      this.logger.debug("Last clip saved", { url });
    });
  }

  private async read(): Promise<Record<string, unknown>> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") return {};
      throw new StateStoreError("read", "could not read state file", { filePath: this.filePath }, toError(error));
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new StateStoreError("read", "state file is not valid JSON", { filePath: this.filePath }, toError(error));
    }

    const parsed = StateFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new StateStoreError("read", "state file is not an object", { filePath: this.filePath });
    }
    return parsed.data;
  }
}

/**
 * Single Firestore document holding the key-value state
 */
export class FirestoreLastClipStore implements LastClipStore {
  private readonly lock = new Mutex();
  private readonly logger: ILogger;

  constructor(
    private readonly collection = "clipcast",
    private readonly docId = "state",
    logger: ILogger = defaultLogger
  ) {
    this.logger = logger.child({ component: "state", backend: "firestore" });
  }

  get(): Promise<string | null> {
    return this.lock.runExclusive(async () => {
      try {
        const snap = await getDb().collection(this.collection).doc(this.docId).get();
        const value: unknown = snap.exists ? snap.get(LAST_CLIP_KEY) : undefined;
        return typeof value === "string" && value.length > 0 ? value : null;
      } catch (error) {
        throw new StateStoreError("read", "could not read state document", { docId: this.docId }, toError(error));
      }
    });
  }

  set(url: string): Promise<void> {
    return this.lock.runExclusive(async () => {
      try {
        await getDb()
          .collection(this.collection)
          .doc(this.docId)
          .set({ [LAST_CLIP_KEY]: url, updatedAt: new Date().toISOString() }, { merge: true });
      } catch (error) {
        throw new StateStoreError("write", "could not write state document", { docId: this.docId }, toError(error));
      }
      this.logger.debug("Last clip saved", { url });
    });
  }
}

export function createLastClipStore(
  config: { backend: "file" | "firestore"; filePath: string },
  logger: ILogger
): LastClipStore {
  return config.backend === "firestore"
    ? new FirestoreLastClipStore("clipcast", "state", logger)
    : new FileLastClipStore(config.filePath, logger);
}

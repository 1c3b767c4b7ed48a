import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { FileLastClipStore, FirestoreLastClipStore } from "../lastClipStore";
import { StateStoreError } from "../../lib/errors";
import { quietLogger } from "../../__tests__/fakes";

// ============================================================================
// Mock Firestore
// ============================================================================

let mockDocData: Record<string, unknown> | null = null;
let mockSetCalls: unknown[][] = [];
let mockDocPaths: string[] = [];

const createMockDb = () => ({
  collection: vi.fn((collection: string) => ({
    doc: vi.fn((docId: string) => {
      mockDocPaths.push(`${collection}/${docId}`);
      return {
        get: vi.fn(async () => ({
          exists: mockDocData !== null,
          get: (field: string) => mockDocData?.[field],
        })),
        set: vi.fn(async (...args: unknown[]) => {
          mockSetCalls.push(args);
        }),
      };
    }),
  })),
});

vi.mock("../../firebase/admin", () => ({
  getDb: vi.fn(() => createMockDb()),
}));

describe("FileLastClipStore", () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "clipcast-state-"));
    filePath = path.join(dir, "nested", "state.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("returns null before anything was played", async () => {
    await expect(new FileLastClipStore(filePath, quietLogger).get()).resolves.toBeNull();
  });

  it("persists the last clip URL across instances", async () => {
    await new FileLastClipStore(filePath, quietLogger).set("https://clips.twitch.tv/AbCdEf123");

    await expect(new FileLastClipStore(filePath, quietLogger).get()).resolves.toBe(
      "https://clips.twitch.tv/AbCdEf123"
    );
  });

  it("keeps unrelated keys in the file", async () => {
    const flatPath = path.join(dir, "state.json");
    await writeFile(flatPath, JSON.stringify({ volume: 5 }), "utf8");

    await new FileLastClipStore(flatPath, quietLogger).set("https://clips.twitch.tv/AbCdEf123");

    const saved: unknown = JSON.parse(await readFile(flatPath, "utf8"));
    expect(saved).toEqual({ volume: 5, lastClipUrl: "https://clips.twitch.tv/AbCdEf123" });
  });

  it("serialises concurrent writes", async () => {
    const store = new FileLastClipStore(filePath, quietLogger);

    await Promise.all([
      store.set("https://clips.twitch.tv/First1"),
      store.set("https://clips.twitch.tv/Second1"),
    ]);

    await expect(store.get()).resolves.toBe("https://clips.twitch.tv/Second1");
  });

  it("rejects a corrupt state file", async () => {
    const flatPath = path.join(dir, "state.json");
    await writeFile(flatPath, "{not json", "utf8");

    await expect(new FileLastClipStore(flatPath, quietLogger).get()).rejects.toBeInstanceOf(StateStoreError);
  });
});

describe("FirestoreLastClipStore", () => {
  beforeEach(() => {
    mockDocData = null;
    mockSetCalls = [];
    mockDocPaths = [];
  });

  it("returns null when the document does not exist", async () => {
    await expect(new FirestoreLastClipStore("clipcast", "state", quietLogger).get()).resolves.toBeNull();
    expect(mockDocPaths).toEqual(["clipcast/state"]);
  });

  it("reads the stored URL", async () => {
    mockDocData = { lastClipUrl: "https://clips.twitch.tv/AbCdEf123" };

    await expect(new FirestoreLastClipStore("clipcast", "state", quietLogger).get()).resolves.toBe(
      "https://clips.twitch.tv/AbCdEf123"
    );
  });

  it("merges the URL into the document", async () => {
    await new FirestoreLastClipStore("clipcast", "state", quietLogger).set("https://clips.twitch.tv/AbCdEf123");

    expect(mockSetCalls).toHaveLength(1);
    expect(mockSetCalls[0][0]).toMatchObject({ lastClipUrl: "https://clips.twitch.tv/AbCdEf123" });
    expect(mockSetCalls[0][1]).toEqual({ merge: true });
  });
});

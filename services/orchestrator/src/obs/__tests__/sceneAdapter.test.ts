import { describe, it, expect, beforeEach } from "vitest";
import { SceneCompositionAdapter } from "../sceneAdapter";
import { DEFAULT_BROWSER_SETTINGS, MONITOR_AND_OUTPUT } from "../constants";
import { FakeCompositor, quietLogger } from "../../__tests__/fakes";

describe("SceneCompositionAdapter", () => {
  let compositor: FakeCompositor;
  let delays: number[];

  function createAdapter() {
    return new SceneCompositionAdapter(compositor, {
      logger: quietLogger,
      sleep: async (ms) => {
        delays.push(ms);
      },
    });
  }

  beforeEach(() => {
    compositor = new FakeCompositor();
    delays = [];
  });

  describe("ensureReady", () => {
    it("creates scene, player source with audio chain, and attaches the scene", async () => {
      await expect(createAdapter().ensureReady()).resolves.toBe(true);

      expect(compositor.count("createScene")).toBe(1);
      expect(compositor.count("createEmbeddableSource")).toBe(1);
      expect(compositor.count("addSceneAsSource")).toBe(1);

      expect(compositor.inputs.get("Clipcast Player")).toEqual({
        settings: DEFAULT_BROWSER_SETTINGS,
        monitorType: MONITOR_AND_OUTPUT,
        volumeDb: -12,
        filters: ["Clipcast Gain", "Clipcast Compressor"],
      });
      expect(compositor.scenes.get("Main")?.get("Clipcast")).toBe(true);
      expect(delays).toEqual([]);
    });

    it("creates nothing on a second call", async () => {
      const adapter = createAdapter();
      await adapter.ensureReady();
      const callsAfterFirst = compositor.calls.length;

      await expect(adapter.ensureReady()).resolves.toBe(true);

      const secondCalls = compositor.calls.slice(callsAfterFirst);
      expect(secondCalls).toEqual([
        "sceneExists",
        "sourceExistsInScene",
        "getMonitorType",
        "getVolumeDb",
        "listAudioFilters",
        "listAudioFilters",
        "getCurrentProgramScene",
        "sourceExistsInScene",
      ]);
    });

    it("stays not ready until an incomplete audio chain is repaired", async () => {
      const adapter = createAdapter();
      compositor.failCreates.set("applyAudioFilter", 3);

      await expect(adapter.ensureReady()).resolves.toBe(false);
      expect(compositor.inputs.get("Clipcast Player")?.filters).toEqual([]);

      await expect(adapter.ensureReady()).resolves.toBe(true);
      expect(compositor.inputs.get("Clipcast Player")?.filters).toEqual(["Clipcast Gain", "Clipcast Compressor"]);
      expect(compositor.count("createEmbeddableSource")).toBe(1);
    });

    it("restores a player volume changed outside the service", async () => {
      const adapter = createAdapter();
      await adapter.ensureReady();
      await compositor.setVolumeDb("Clipcast Player", 0);

      await expect(adapter.ensureReady()).resolves.toBe(true);
      expect(compositor.inputs.get("Clipcast Player")?.volumeDb).toBe(-12);
    });

    it("runs concurrent calls one at a time", async () => {
      const adapter = createAdapter();

      await expect(Promise.all([adapter.ensureReady(), adapter.ensureReady()])).resolves.toEqual([true, true]);
      expect(compositor.count("createScene")).toBe(1);
      expect(compositor.count("createEmbeddableSource")).toBe(1);
      expect(compositor.count("addSceneAsSource")).toBe(1);
    });

    it("skips attachment when the clip scene is the active scene", async () => {
      compositor.programScene = "Clipcast";

      await expect(createAdapter().ensureReady()).resolves.toBe(true);
      expect(compositor.count("addSceneAsSource")).toBe(0);
    });

    it("retries creation with a fixed delay", async () => {
      compositor.failCreates.set("createScene", 2);

      await expect(createAdapter().ensureReady()).resolves.toBe(true);
      expect(compositor.count("createScene")).toBe(3);
      expect(delays).toEqual([1000, 1000]);
    });

    it("reports failure after the last attempt without continuing", async () => {
      compositor.failCreates.set("createScene", 3);

      await expect(createAdapter().ensureReady()).resolves.toBe(false);
      expect(compositor.count("createScene")).toBe(3);
      expect(compositor.count("createEmbeddableSource")).toBe(0);
      expect(delays).toEqual([1000, 1000]);
    });

    it("fails when the volume read-back is off", async () => {
      compositor.volumeDrift = 1;

      await expect(createAdapter().ensureReady()).resolves.toBe(false);
      expect(compositor.count("applyAudioFilter")).toBe(0);
    });

    it("retries a missing audio filter", async () => {
      compositor.failCreates.set("applyAudioFilter", 1);

      await expect(createAdapter().ensureReady()).resolves.toBe(true);
      expect(compositor.count("applyAudioFilter")).toBe(3);
      expect(delays).toEqual([1000]);
    });

    it("converts a thrown compositor error into false", async () => {
      compositor.throwOnSceneList = new Error("socket closed");

      await expect(createAdapter().ensureReady()).resolves.toBe(false);
    });
  });

  describe("visibility", () => {
    it("hides and shows both the player and the nested scene", async () => {
      const adapter = createAdapter();
      await adapter.ensureReady();

      await expect(adapter.hide()).resolves.toBe(true);
      expect(compositor.scenes.get("Clipcast")?.get("Clipcast Player")).toBe(false);
      expect(compositor.scenes.get("Main")?.get("Clipcast")).toBe(false);

      await expect(adapter.show()).resolves.toBe(true);
      expect(compositor.scenes.get("Clipcast")?.get("Clipcast Player")).toBe(true);
      expect(compositor.scenes.get("Main")?.get("Clipcast")).toBe(true);
    });

    it("fails when the toggle does not stick", async () => {
      const adapter = createAdapter();
      await adapter.ensureReady();
      compositor.ignoreVisibilityWrites = true;

      await expect(adapter.hide()).resolves.toBe(false);
    });

    it("fails when the surface does not exist", async () => {
      await expect(createAdapter().show()).resolves.toBe(false);
    });
  });

  describe("setUrl", () => {
    it("writes, refreshes and verifies the URL", async () => {
      const adapter = createAdapter();
      await adapter.ensureReady();

      await expect(adapter.setUrl("http://localhost:8080/")).resolves.toBe(true);
      expect(compositor.inputs.get("Clipcast Player")?.settings.url).toBe("http://localhost:8080/");
      expect(compositor.refreshes).toEqual(["Clipcast Player"]);
    });

    it("fails on a read-back mismatch", async () => {
      const adapter = createAdapter();
      await adapter.ensureReady();
      compositor.ignoreUrlWrites = true;

      await expect(adapter.setUrl("http://localhost:8080/")).resolves.toBe(false);
    });

    it("reset hides the surface and blanks the player", async () => {
      const adapter = createAdapter();
      await adapter.ensureReady();
      await adapter.setUrl("http://localhost:8080/");

      await expect(adapter.reset()).resolves.toBe(true);
      expect(compositor.inputs.get("Clipcast Player")?.settings.url).toBe("about:blank");
      expect(compositor.scenes.get("Clipcast")?.get("Clipcast Player")).toBe(false);
    });
  });
});

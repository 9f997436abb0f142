import { describe, expect, it } from "vitest";
import { ConfigStore } from "../src/config.store";
import { DEFAULT_CONFIG } from "../src/defaults";

describe("ConfigStore", () => {
  it("seeds from the defaults and hands out copies", () => {
    const store = new ConfigStore();
    const snapshot = store.getSnapshot();
    snapshot.agent.maxIterations = 99;

    expect(store.getSnapshot()).toEqual(DEFAULT_CONFIG);
  });

  it("emits only when the snapshot actually changes", () => {
    const store = new ConfigStore();
    const seen: number[] = [];
    const subscription = store.changes$.subscribe((config) => {
      seen.push(config.agent.maxIterations);
    });

    store.setSnapshot(structuredClone(DEFAULT_CONFIG));
    store.setSnapshot({
      ...DEFAULT_CONFIG,
      agent: { ...DEFAULT_CONFIG.agent, maxIterations: 3 },
    });
    subscription.unsubscribe();

    expect(seen).toEqual([10, 3]);
  });
});

import { describe, expect, it } from "vitest";
import { DetailHydrator } from "../src/detail/hydrator";
import { CustomContext } from "../src/custom/context";
import { CustomRegistry, type AnalyzeArgs, type RunArgs } from "../src/custom/registry";
import { Resource } from "../src/runtime/resource";
import { FakeHost } from "./_helpers/fakeHost";

function createContext() {
  const host = new FakeHost();
  const resource = new Resource(host);
  const hydrator = new DetailHydrator(host, { maxListAttempts: 3 });
  return new CustomContext(host, resource, hydrator, 1);
}

const analyzeArgs: AnalyzeArgs = {
  taskId: 1,
  nodeName: "Find",
  name: "Finder",
  param: { color: "red" },
  image: Buffer.alloc(4),
  roi: [0, 0, 10, 10],
};

const runArgs: RunArgs = {
  taskId: 1,
  nodeName: "Press",
  name: "Presser",
  param: null,
  box: [1, 1, 2, 2],
  recoId: 3,
  recoDetail: "",
};

describe("CustomRegistry", () => {
  it("routes calls to the handler registered under the name", async () => {
    const registry = new CustomRegistry();
    const seen: AnalyzeArgs[] = [];
    registry.registerRecognition("Finder", {
      analyze: (_context, args) => {
        seen.push(args);
        return { box: [2, 2, 4, 4], detail: "{}" };
      },
    });

    const result = await registry.analyze(createContext(), analyzeArgs);

    expect(result).toEqual({ box: [2, 2, 4, 4], detail: "{}" });
    expect(seen).toEqual([analyzeArgs]);
  });

  it("treats a missing or failing recognition as no match", async () => {
    const registry = new CustomRegistry();
    const context = createContext();

    expect(await registry.analyze(context, analyzeArgs)).toBeNull();

    registry.registerRecognition("Finder", {
      analyze: async () => {
        throw new Error("model not loaded");
      },
    });
    expect(await registry.analyze(context, analyzeArgs)).toBeNull();
  });

  it("treats a missing or failing action as failed", async () => {
    const registry = new CustomRegistry();
    const context = createContext();

    expect(await registry.run(context, runArgs)).toBe(false);

    registry.registerAction("Presser", {
      run: () => {
        throw new Error("device busy");
      },
    });
    expect(await registry.run(context, runArgs)).toBe(false);

    registry.registerAction("Presser", { run: async () => true });
    expect(await registry.run(context, runArgs)).toBe(true);
  });

  it("lists, unregisters and clears handlers", () => {
    const registry = new CustomRegistry();
    registry.registerRecognition("A", { analyze: () => null });
    registry.registerRecognition("B", { analyze: () => null });
    registry.registerAction("C", { run: () => true });

    expect(registry.recognitionNames()).toEqual(["A", "B"]);
    expect(registry.unregisterRecognition("A")).toBe(true);
    expect(registry.unregisterRecognition("A")).toBe(false);
    expect(registry.recognitionNames()).toEqual(["B"]);

    registry.clearRecognitions();
    registry.clearActions();
    expect(registry.recognitionNames()).toEqual([]);
    expect(registry.actionNames()).toEqual([]);
  });
});

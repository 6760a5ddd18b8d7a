import { describe, expect, it } from "vitest";
import { DetailHydrator, parseDetailPayload, subRecognitionIds } from "../src/detail/hydrator";
import { RecognitionCycleError } from "../src/errors";
import { JobStatus } from "../src/host/types";
import { FakeHost, actionQuery, recognitionQuery } from "./_helpers/fakeHost";

function setup() {
  const host = new FakeHost();
  const hydrator = new DetailHydrator(host, { maxListAttempts: 3 });
  return { host, hydrator };
}

async function captureError(run: () => Promise<unknown>): Promise<unknown> {
  try {
    await run();
  } catch (error) {
    return error;
  }
  throw new Error("expected the call to fail");
}

function seedNode(host: FakeHost, nodeId: number, name: string) {
  const recoId = nodeId * 10;
  const actionId = nodeId * 10 + 1;
  host.nodes.set(nodeId, { node_name: name, reco_id: recoId, action_id: actionId, completed: true });
  host.recognitions.set(recoId, recognitionQuery({ node_name: name }));
  host.actions.set(actionId, actionQuery({ node_name: name, action: "Click", box: [1, 2, 3, 4] }));
}

describe("parseDetailPayload", () => {
  it("parses JSON text and maps empty or broken text to null", () => {
    expect(parseDetailPayload('{"score":0.9}')).toEqual({ score: 0.9 });
    expect(parseDetailPayload("")).toBeNull();
    expect(parseDetailPayload("{not json")).toBeNull();
  });
});

describe("subRecognitionIds", () => {
  it("collects reco ids from composite results in order", () => {
    expect(subRecognitionIds([{ reco_id: 4, hit: true }, { name: "x" }, { reco_id: 2 }])).toEqual([4, 2]);
    expect(subRecognitionIds({ reco_id: 4 })).toEqual([]);
  });
});

describe("DetailHydrator", () => {
  it("expands And results into sub details", async () => {
    const { host, hydrator } = setup();
    host.recognitions.set(
      10,
      recognitionQuery({
        node_name: "Both",
        algorithm: "And",
        hit: false,
        detail: JSON.stringify([{ reco_id: 11 }, { reco_id: 12 }]),
      }),
    );
    host.recognitions.set(11, recognitionQuery({ node_name: "Left", algorithm: "TemplateMatch", hit: true }));
    host.recognitions.set(12, recognitionQuery({ node_name: "Right", algorithm: "OCR", hit: false }));

    const detail = await hydrator.fetchRecognition(10);

    expect(detail?.algorithm).toBe("And");
    expect(detail?.sub_details.map((sub) => sub.hit)).toEqual([true, false]);
    expect(detail?.sub_details.map((sub) => sub.reco_id)).toEqual([11, 12]);
    expect(detail?.sub_details[0].algorithm).toBe("TemplateMatch");
  });

  it("skips composite members the engine no longer has", async () => {
    const { host, hydrator } = setup();
    host.recognitions.set(
      10,
      recognitionQuery({ algorithm: "Or", detail: JSON.stringify([{ reco_id: 11 }, { reco_id: 99 }]) }),
    );
    host.recognitions.set(11, recognitionQuery({ hit: true }));

    const detail = await hydrator.fetchRecognition(10);

    expect(detail?.sub_details.map((sub) => sub.reco_id)).toEqual([11]);
  });

  it("does not expand non-composite algorithms", async () => {
    const { host, hydrator } = setup();
    host.recognitions.set(10, recognitionQuery({ algorithm: "FeatureMatch", detail: JSON.stringify([{ reco_id: 11 }]) }));
    host.recognitions.set(11, recognitionQuery());

    const detail = await hydrator.fetchRecognition(10);

    expect(detail?.sub_details).toEqual([]);
    expect(detail?.detail).toEqual([{ reco_id: 11 }]);
  });

  it("reports algorithms it does not model as Unknown", async () => {
    const { host, hydrator } = setup();
    host.recognitions.set(10, recognitionQuery({ algorithm: "Telepathy" }));

    expect((await hydrator.fetchRecognition(10))?.algorithm).toBe("Unknown");
  });

  it("rejects a composite recognition that contains itself", async () => {
    const { host, hydrator } = setup();
    host.recognitions.set(30, recognitionQuery({ algorithm: "And", detail: JSON.stringify([{ reco_id: 31 }]) }));
    host.recognitions.set(31, recognitionQuery({ algorithm: "Or", detail: JSON.stringify([{ reco_id: 30 }]) }));

    const error = await captureError(() => hydrator.fetchRecognition(30));

    expect(error).toBeInstanceOf(RecognitionCycleError);
    expect(error).toMatchObject({ recoId: 30, chain: [30, 31] });
  });

  it("returns null for ids the engine does not know", async () => {
    const { hydrator } = setup();

    expect(await hydrator.fetchTask(1)).toBeNull();
    expect(await hydrator.fetchNode(1)).toBeNull();
    expect(await hydrator.fetchRecognition(1)).toBeNull();
    expect(await hydrator.fetchAction(1)).toBeNull();
  });

  it("hydrates a node with its recognition and action", async () => {
    const { host, hydrator } = setup();
    seedNode(host, 2, "Start");

    const node = await hydrator.fetchNode(2);

    expect(node).toMatchObject({ node_id: 2, node_name: "Start", reco_id: 20, action_id: 21, completed: true });
    expect(node?.recognition?.hit).toBe(true);
    expect(node?.action).toEqual({
      action_id: 21,
      node_name: "Start",
      action: "Click",
      box_rect: [1, 2, 3, 4],
      success: true,
      detail: null,
    });
  });

  it("leaves recognition and action empty when a node has not produced them", async () => {
    const { host, hydrator } = setup();
    host.nodes.set(3, { node_name: "Idle", reco_id: 0, action_id: 0, completed: false });

    const node = await hydrator.fetchNode(3);

    expect(node?.recognition).toBeNull();
    expect(node?.action).toBeNull();
  });

  it("keeps a slot for every node of a partially run task", async () => {
    const { host, hydrator } = setup();
    seedNode(host, 1, "A");
    seedNode(host, 2, "B");
    host.tasks.set(5, { entry: "A", nodeIds: [1, 2, 3], status: JobStatus.Failed });

    const task = await hydrator.fetchTask(5);

    expect(task?.node_id_list).toEqual([1, 2, 3]);
    expect(task?.nodes.map((node) => node?.node_name ?? null)).toEqual(["A", "B", null]);
    expect(task?.status).toBe(JobStatus.Failed);
  });

  it("isolates a failing node query to its own slot", async () => {
    const { host, hydrator } = setup();
    seedNode(host, 1, "A");
    seedNode(host, 2, "B");
    host.failingNodes.add(1);
    host.tasks.set(5, { entry: "A", nodeIds: [1, 2], status: JobStatus.Succeeded });

    const task = await hydrator.fetchTask(5);

    expect(task?.nodes.map((node) => node?.node_name ?? null)).toEqual([null, "B"]);
  });

  it("returns equal trees for repeated fetches of a finished task", async () => {
    const { host, hydrator } = setup();
    seedNode(host, 1, "A");
    host.tasks.set(5, { entry: "A", nodeIds: [1], status: JobStatus.Succeeded });

    expect(await hydrator.fetchTask(5)).toEqual(await hydrator.fetchTask(5));
  });

  it("retries the node list when it grows between queries", async () => {
    const { host, hydrator } = setup();
    seedNode(host, 1, "A");
    seedNode(host, 2, "B");
    host.tasks.set(5, { entry: "A", nodeIds: [1], status: JobStatus.Running });
    let grown = false;
    host.beforeFill = () => {
      if (!grown) {
        grown = true;
        host.tasks.set(5, { entry: "A", nodeIds: [1, 2], status: JobStatus.Running });
      }
    };

    const task = await hydrator.fetchTask(5);

    expect(task?.node_id_list).toEqual([1, 2]);
    expect(host.taskDetailCalls).toBe(4);
  });

  it("gives up after the configured number of list attempts", async () => {
    const { host, hydrator } = setup();
    const nodeIds: number[] = [];
    host.tasks.set(5, { entry: "A", nodeIds, status: JobStatus.Running });
    host.beforeFill = () => {
      nodeIds.push(nodeIds.length + 1);
    };

    expect(await hydrator.fetchTask(5)).toBeNull();
    expect(host.taskDetailCalls).toBe(6);
  });
});

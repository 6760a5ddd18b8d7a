import { PipelineParseError } from "@sightline/pipeline";
import { describe, expect, it, vi } from "vitest";
import { HostCallError } from "../src/errors";
import { JobStatus } from "../src/host/types";
import type { ContextEvent } from "../src/notification/events";
import { Resource } from "../src/runtime/resource";
import { Tasker } from "../src/runtime/tasker";
import { FakeHost } from "./_helpers/fakeHost";

function setup() {
  const host = new FakeHost();
  const resource = new Resource(host);
  const tasker = new Tasker(host, resource);
  return { host, resource, tasker };
}

describe("Tasker", () => {
  it("runs a task from an override and hydrates its result", async () => {
    const { tasker } = setup();

    const job = await tasker.postTask("Entry", {
      Entry: { recognition: "DirectHit", action: "Click", target: [10, 10, 5, 5] },
    });

    expect(await job.wait()).toBe(JobStatus.Succeeded);
    const detail = await job.get(false);
    expect(detail?.entry).toBe("Entry");
    expect(detail?.status).toBe(JobStatus.Succeeded);
    expect(detail?.nodes).toHaveLength(1);
    expect(detail?.nodes[0]?.recognition?.hit).toBe(true);
    expect(detail?.nodes[0]?.action?.box_rect).toEqual([10, 10, 5, 5]);
    expect(detail?.nodes[0]?.action?.success).toBe(true);
  });

  it("sends the merged override in wire form", async () => {
    const { host, tasker } = setup();
    host.seedNode("Entry", { action: "Click", target: [1, 1, 1, 1], timeout: 3000 });

    const job = await tasker.postTask("Entry", { Entry: { target: [2, 2, 2, 2] } });

    expect(host.postedTasks[0].pipeline).toMatchObject({
      Entry: {
        recognition: { type: "DirectHit" },
        action: { type: "Click", param: { target: [2, 2, 2, 2] } },
        timeout: 3000,
      },
    });
    expect((await job.get(true))?.nodes[0]?.action?.box_rect).toEqual([2, 2, 2, 2]);
  });

  it("runs a loaded node without an override", async () => {
    const { host, tasker } = setup();
    host.seedNode("Entry", { action: "Click", target: [1, 1, 1, 1] });

    const job = await tasker.postTask("Entry");

    expect(host.postedTasks[0].pipeline).toEqual({});
    expect((await job.get())?.nodes[0]?.action?.box_rect).toEqual([1, 1, 1, 1]);
  });

  it("refuses an entry that no pipeline defines", async () => {
    const { host, tasker } = setup();

    await expect(tasker.postTask("Nowhere")).rejects.toThrow('entry: unknown node "Nowhere"');
    expect(host.postedTasks).toEqual([]);
  });

  it("refuses an invalid override before posting", async () => {
    const { host, tasker } = setup();

    await expect(tasker.postTask("Entry", { Entry: { recognition: "TemplateMatch" } })).rejects.toBeInstanceOf(
      PipelineParseError,
    );
    expect(host.postedTasks).toEqual([]);
  });

  it("reports a task the engine rejects", async () => {
    const { host, tasker } = setup();
    host.accept = false;

    await expect(tasker.postTask("Entry", { Entry: {} })).rejects.toBeInstanceOf(HostCallError);
  });

  it("posts a validated recognition", async () => {
    const { host, tasker } = setup();

    await expect(tasker.postRecognition("TemplateMatch", {}, Buffer.alloc(0))).rejects.toBeInstanceOf(
      PipelineParseError,
    );
    const job = await tasker.postRecognition("OCR", { expected: "Go" }, Buffer.from("img"));

    expect(host.postedRecognitions).toHaveLength(1);
    expect(host.postedRecognitions[0].param).toMatchObject({ expected: ["Go"] });
    const detail = await job.get(true);
    expect(detail?.algorithm).toBe("OCR");
    expect(detail?.detail).toMatchObject({ expected: ["Go"] });
  });

  it("posts a validated action", async () => {
    const { host, tasker } = setup();

    const job = await tasker.postAction("Click", { target: [1, 2, 3, 4] }, [0, 0, 8, 8]);

    expect(host.postedActions[0]).toMatchObject({
      type: "Click",
      param: { target: [1, 2, 3, 4], target_offset: [0, 0, 0, 0] },
      box: [0, 0, 8, 8],
      recoDetail: "",
    });
    const detail = await job.get();
    expect(detail?.action).toBe("Click");
    expect(detail?.box_rect).toEqual([0, 0, 8, 8]);
  });

  it("returns a job for stop requests", async () => {
    const { tasker } = setup();

    const job = await tasker.postStop();

    expect(await job.pending()).toBe(true);
  });

  it("overrides the pipeline of one task", async () => {
    const { host, tasker } = setup();
    host.seedNode("Entry", { action: "Click" });
    const job = await tasker.postTask("Entry");

    await job.overridePipeline({ Entry: { enabled: false } });
    await tasker.overridePipeline(job.id, { Entry: { timeout: 1 } });

    expect(host.taskOverrides.map((entry) => entry.taskId)).toEqual([job.id, job.id]);
    expect(host.taskOverrides[1].pipeline).toMatchObject({ Entry: { timeout: 1, enabled: true } });
    expect(host.pipelineOverrides).toEqual([]);
  });

  it("looks up the latest run of a node", async () => {
    const { tasker } = setup();
    const job = await tasker.postTask("Entry", { Entry: {} });

    const latest = await tasker.getLatestNode("Entry");

    expect(latest?.node_name).toBe("Entry");
    expect((await tasker.getTaskJob(job.id).get())?.node_id_list).toEqual([latest?.node_id]);
    expect(await tasker.getLatestNode("Other")).toBeNull();
  });

  it("routes tasker, controller and context notifications", () => {
    const { host, tasker } = setup();
    const raw = vi.fn();
    const contextEvents: ContextEvent[] = [];
    tasker.addSink(raw);
    tasker.addContextEventSink({ onEvent: (event) => void contextEvents.push(event) });

    host.emit({ source: "tasker", message: "Tasker.Task.Starting", detail: "{}" });
    host.emit({ source: "controller", message: "Controller.Action.Starting", detail: "{}" });
    host.emit({ source: "resource", message: "Resource.Loading.Starting", detail: "{}" });
    host.emit({
      source: "context",
      message: "Node.Action.Starting",
      detail: JSON.stringify({ task_id: 1, action_id: 2, name: "A" }),
    });
    tasker.dispose();
    host.emit({ source: "tasker", message: "Tasker.Task.Succeeded", detail: "{}" });

    expect(raw.mock.calls.map(([message]) => message)).toEqual(["Tasker.Task.Starting", "Controller.Action.Starting"]);
    expect(contextEvents).toEqual([
      { kind: "NodeAction", phase: "Starting", detail: { task_id: 1, action_id: 2, name: "A", focus: null } },
    ]);
  });
});

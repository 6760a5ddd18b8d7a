import { describe, expect, it } from "vitest";
import { NotificationMessages } from "../src/notification/events";
import { parseContextEvent, parseEvent, parseNotificationType } from "../src/notification/parse";

describe("parseNotificationType", () => {
  it("reads the phase from the suffix", () => {
    expect(parseNotificationType("Tasker.Task.Starting")).toBe("Starting");
    expect(parseNotificationType("Node.Action.Succeeded")).toBe("Succeeded");
    expect(parseNotificationType("Resource.Loading.Failed")).toBe("Failed");
    expect(parseNotificationType("Tasker.Task.Paused")).toBe("Unknown");
    expect(parseNotificationType("")).toBe("Unknown");
  });
});

describe("parseEvent", () => {
  it("decodes a task event", () => {
    const event = parseEvent(
      NotificationMessages.taskerTaskSucceeded,
      JSON.stringify({ task_id: 3, entry: "Start", uuid: "u-1", hash: "h-1" }),
    );

    expect(event).toEqual({
      kind: "TaskerTask",
      phase: "Succeeded",
      detail: { task_id: 3, entry: "Start", uuid: "u-1", hash: "h-1" },
    });
  });

  it("fills defaults for optional payload fields", () => {
    const event = parseEvent(
      "Node.NextList.Starting",
      JSON.stringify({ task_id: 1, name: "Start", list: [{ name: "B" }, { name: "C", jump_back: true }] }),
    );

    expect(event).toEqual({
      kind: "NodeNextList",
      phase: "Starting",
      detail: {
        task_id: 1,
        name: "Start",
        list: [
          { name: "B", jump_back: false, anchor: false },
          { name: "C", jump_back: true, anchor: false },
        ],
        focus: null,
      },
    });
  });

  it("reads a next-list event without a list as empty", () => {
    expect(parseEvent("Node.NextList.Succeeded", JSON.stringify({ task_id: 1, name: "Start" }))).toEqual({
      kind: "NodeNextList",
      phase: "Succeeded",
      detail: { task_id: 1, name: "Start", list: [], focus: null },
    });
  });

  it("tells node events apart from their trace variants", () => {
    const payload = JSON.stringify({ task_id: 1, node_id: 2, name: "A" });

    expect(parseEvent("Node.RecognitionNode.Starting", payload).kind).toBe("NodeRecognitionNode");
    expect(parseEvent("Node.ActionNode.Failed", payload).kind).toBe("NodeActionNode");
    expect(parseEvent("Node.PipelineNode.Succeeded", payload).kind).toBe("NodePipelineNode");
    expect(
      parseEvent("Node.Recognition.Starting", JSON.stringify({ task_id: 1, reco_id: 5, name: "A" })).kind,
    ).toBe("NodeRecognition");
  });

  it("keeps unrecognized messages as Unknown with the raw text", () => {
    expect(parseEvent("Foo.Bar", "{}")).toEqual({ kind: "Unknown", message: "Foo.Bar", raw_json: "{}", error: null });
  });

  it("keeps a known prefix with an unknown phase as Unknown", () => {
    expect(parseEvent("Tasker.Task.Paused", "{}")).toEqual({
      kind: "Unknown",
      message: "Tasker.Task.Paused",
      raw_json: "{}",
      error: null,
    });
  });

  it("records why a payload could not be decoded", () => {
    const broken = parseEvent("Tasker.Task.Starting", "{oops");
    const wrongShape = parseEvent("Resource.Loading.Starting", JSON.stringify({ res_id: "one" }));

    expect(broken.kind).toBe("Unknown");
    expect(broken.kind === "Unknown" && broken.error).toBeTruthy();
    expect(wrongShape).toMatchObject({
      kind: "Unknown",
      message: "Resource.Loading.Starting",
      raw_json: '{"res_id":"one"}',
    });
    expect(wrongShape.kind === "Unknown" && typeof wrongShape.error).toBe("string");
  });
});

describe("parseContextEvent", () => {
  it("passes node events through", () => {
    const event = parseContextEvent(
      "Node.Action.Succeeded",
      JSON.stringify({ task_id: 1, action_id: 4, name: "A" }),
    );

    expect(event).toEqual({
      kind: "NodeAction",
      phase: "Succeeded",
      detail: { task_id: 1, action_id: 4, name: "A", focus: null },
    });
  });

  it("turns engine-level events into Unknown", () => {
    const detail = JSON.stringify({ task_id: 3, entry: "Start" });

    expect(parseContextEvent("Tasker.Task.Starting", detail)).toEqual({
      kind: "Unknown",
      message: "Tasker.Task.Starting",
      raw_json: detail,
      error: null,
    });
  });
});

import { z } from "zod";
import {
  controllerActionDetailSchema,
  nodeActionDetailSchema,
  nodeNextListDetailSchema,
  nodePipelineNodeDetailSchema,
  nodeRecognitionDetailSchema,
  resourceLoadingDetailSchema,
  taskerTaskDetailSchema,
} from "./details";
import type { ContextEvent, EngineEvent, EventKind, NodeEvent, NotificationType, UnknownEvent } from "./events";

// Matched in order against the message, so each prefix ends at its dot.
const EVENT_PREFIXES: readonly (readonly [string, Exclude<EventKind, "Unknown">])[] = [
  ["Resource.Loading.", "ResourceLoading"],
  ["Controller.Action.", "ControllerAction"],
  ["Tasker.Task.", "TaskerTask"],
  ["Node.PipelineNode.", "NodePipelineNode"],
  ["Node.Recognition.", "NodeRecognition"],
  ["Node.Action.", "NodeAction"],
  ["Node.NextList.", "NodeNextList"],
  ["Node.RecognitionNode.", "NodeRecognitionNode"],
  ["Node.ActionNode.", "NodeActionNode"],
];

/** Phase of a notification, read from its suffix. */
export function parseNotificationType(message: string): NotificationType {
  if (message.endsWith(".Starting")) {
    return "Starting";
  }
  if (message.endsWith(".Succeeded")) {
    return "Succeeded";
  }
  if (message.endsWith(".Failed")) {
    return "Failed";
  }
  return "Unknown";
}

function unknownEvent(message: string, detailJson: string, error: string | null): UnknownEvent {
  return { kind: "Unknown", message, raw_json: detailJson, error };
}

type Decoded<T> = { ok: true; value: T } | { ok: false; error: string };

function decode<S extends z.ZodTypeAny>(schema: S, payload: unknown): Decoded<z.output<S>> {
  const parsed = schema.safeParse(payload);
  return parsed.success ? { ok: true, value: parsed.data } : { ok: false, error: parsed.error.message };
}

/**
 * Turns a raw `(message, detail)` notification into a typed event. Anything
 * that cannot be typed becomes an `Unknown` event carrying the original text.
 */
export function parseEvent(message: string, detailJson: string): EngineEvent {
  const match = EVENT_PREFIXES.find(([prefix]) => message.startsWith(prefix));
  const phase = parseNotificationType(message);
  if (!match || phase === "Unknown") {
    return unknownEvent(message, detailJson, null);
  }

  let payload: unknown;
  try {
    payload = JSON.parse(detailJson);
  } catch (error) {
    return unknownEvent(message, detailJson, error instanceof Error ? error.message : String(error));
  }

  const kind = match[1];
  switch (kind) {
    case "ResourceLoading": {
      const decoded = decode(resourceLoadingDetailSchema, payload);
      return decoded.ok ? { kind, phase, detail: decoded.value } : unknownEvent(message, detailJson, decoded.error);
    }
    case "ControllerAction": {
      const decoded = decode(controllerActionDetailSchema, payload);
      return decoded.ok ? { kind, phase, detail: decoded.value } : unknownEvent(message, detailJson, decoded.error);
    }
    case "TaskerTask": {
      const decoded = decode(taskerTaskDetailSchema, payload);
      return decoded.ok ? { kind, phase, detail: decoded.value } : unknownEvent(message, detailJson, decoded.error);
    }
    case "NodePipelineNode": {
      const decoded = decode(nodePipelineNodeDetailSchema, payload);
      return decoded.ok ? { kind, phase, detail: decoded.value } : unknownEvent(message, detailJson, decoded.error);
    }
    case "NodeRecognition": {
      const decoded = decode(nodeRecognitionDetailSchema, payload);
      return decoded.ok ? { kind, phase, detail: decoded.value } : unknownEvent(message, detailJson, decoded.error);
    }
    case "NodeAction": {
      const decoded = decode(nodeActionDetailSchema, payload);
      return decoded.ok ? { kind, phase, detail: decoded.value } : unknownEvent(message, detailJson, decoded.error);
    }
    case "NodeNextList": {
      const decoded = decode(nodeNextListDetailSchema, payload);
      return decoded.ok ? { kind, phase, detail: decoded.value } : unknownEvent(message, detailJson, decoded.error);
    }
    case "NodeRecognitionNode": {
      const decoded = decode(nodePipelineNodeDetailSchema, payload);
      return decoded.ok ? { kind, phase, detail: decoded.value } : unknownEvent(message, detailJson, decoded.error);
    }
    case "NodeActionNode": {
      const decoded = decode(nodePipelineNodeDetailSchema, payload);
      return decoded.ok ? { kind, phase, detail: decoded.value } : unknownEvent(message, detailJson, decoded.error);
    }
  }
}

function isNodeEvent(event: EngineEvent): event is NodeEvent {
  return event.kind.startsWith("Node");
}

/** Like {@link parseEvent}, restricted to the node-level events a running task emits. */
export function parseContextEvent(message: string, detailJson: string): ContextEvent {
  const event = parseEvent(message, detailJson);
  if (event.kind === "Unknown" || isNodeEvent(event)) {
    return event;
  }
  return unknownEvent(message, detailJson, null);
}

import type { Action } from "./schema/action";
import type { NodeAttr, PipelineNode } from "./schema/node";
import type { Recognition, RecognitionRef } from "./schema/recognition";

export interface WireVariant {
  type: string;
  param: Record<string, unknown>;
}

export type WireNode = Record<string, unknown>;

function cloneParam(param: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(param).map(([key, value]) => [key, structuredClone(value)]));
}

export function serializeRecognitionRef(ref: RecognitionRef): string | WireVariant {
  return typeof ref === "string" ? ref : serializeRecognition(ref);
}

export function serializeRecognition(recognition: Recognition): WireVariant {
  switch (recognition.type) {
    case "And":
      return {
        type: recognition.type,
        param: {
          all_of: recognition.param.all_of.map(serializeRecognitionRef),
          box_index: recognition.param.box_index,
        },
      };
    case "Or":
      return {
        type: recognition.type,
        param: { any_of: recognition.param.any_of.map(serializeRecognitionRef) },
      };
    default:
      return { type: recognition.type, param: cloneParam(recognition.param) };
  }
}

export function serializeAction(action: Action): WireVariant {
  return { type: action.type, param: cloneParam(action.param) };
}

export function serializeNodeAttr(attr: NodeAttr): NodeAttr {
  return { name: attr.name, jump_back: attr.jump_back, anchor: attr.anchor };
}

/** Canonical wire form: every field present, variants as `{ type, param }`. */
export function serializeNode(node: PipelineNode): WireNode {
  const { recognition, action, next, on_error, ...scalars } = node;
  return {
    recognition: serializeRecognition(recognition),
    action: serializeAction(action),
    next: next.map(serializeNodeAttr),
    on_error: on_error.map(serializeNodeAttr),
    ...cloneParam(scalars),
  };
}

export function serializePipeline(nodes: ReadonlyMap<string, PipelineNode>): Record<string, WireNode> {
  const output: Record<string, WireNode> = {};
  for (const [name, node] of nodes) {
    output[name] = serializeNode(node);
  }
  return output;
}

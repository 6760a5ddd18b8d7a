import { parseNode } from "./merge";
import { actionParamKeys, isActionType, swipeParamSchema } from "./schema/action";
import { NODE_KEYS, nodeAttrObjectSchema, waitFreezesObjectSchema, type PipelineNode } from "./schema/node";
import { isRecognitionType, recognitionParamKeys } from "./schema/recognition";
import { isPlainObject } from "./validate";

const NODE_ATTR_KEYS = Object.keys(nodeAttrObjectSchema.shape);
const WAIT_FREEZES_KEYS = Object.keys(waitFreezesObjectSchema.shape);
const SWIPE_KEYS = Object.keys(swipeParamSchema.shape);
const WAIT_FREEZES_FIELDS = ["pre_wait_freezes", "post_wait_freezes", "repeat_wait_freezes"];

function pick(value: Record<string, unknown>, keys: readonly string[]): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([key]) => keys.includes(key)));
}

function pruneRecognition(value: unknown): unknown {
  if (!isPlainObject(value)) {
    return value;
  }
  const payload = pick(value, ["type", "param"]);
  const { type, param } = payload;
  if (typeof type !== "string" || !isRecognitionType(type) || !isPlainObject(param)) {
    return payload;
  }

  const kept = pick(param, recognitionParamKeys[type]);
  for (const key of ["all_of", "any_of"]) {
    const members = kept[key];
    if (Array.isArray(members)) {
      kept[key] = members.map(pruneRecognition);
    }
  }
  return { type, param: kept };
}

function pruneAction(value: unknown): unknown {
  if (!isPlainObject(value)) {
    return value;
  }
  const payload = pick(value, ["type", "param"]);
  const { type, param } = payload;
  if (typeof type !== "string" || !isActionType(type) || !isPlainObject(param)) {
    return payload;
  }

  const kept = pick(param, actionParamKeys[type]);
  const swipes = kept.swipes;
  if (Array.isArray(swipes)) {
    kept.swipes = swipes.map((swipe: unknown) => (isPlainObject(swipe) ? pick(swipe, SWIPE_KEYS) : swipe));
  }
  return { type, param: kept };
}

function pruneAttrList(value: unknown): unknown {
  if (!Array.isArray(value)) {
    return value;
  }
  return value.map((attr: unknown) => (isPlainObject(attr) ? pick(attr, NODE_ATTR_KEYS) : attr));
}

/**
 * Drops fields this library does not model from node data the engine reports.
 * Engines add fields over time; user patches still go through the strict path.
 */
export function pruneNodeData(value: unknown): unknown {
  if (!isPlainObject(value)) {
    return value;
  }

  const node = pick(value, NODE_KEYS);
  if ("recognition" in node) {
    node.recognition = pruneRecognition(node.recognition);
  }
  if ("action" in node) {
    node.action = pruneAction(node.action);
  }
  for (const key of ["next", "on_error"]) {
    if (key in node) {
      node[key] = pruneAttrList(node[key]);
    }
  }
  for (const key of WAIT_FREEZES_FIELDS) {
    const freezes = node[key];
    if (isPlainObject(freezes)) {
      node[key] = pick(freezes, WAIT_FREEZES_KEYS);
    }
  }
  return node;
}

/** Parses a node definition read back from the engine, ignoring fields it does not know. */
export function readEngineNode(value: unknown, name = ""): PipelineNode {
  return parseNode(pruneNodeData(value), name);
}

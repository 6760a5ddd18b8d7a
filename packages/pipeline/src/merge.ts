import { PipelineParseError, PipelineReferenceError, type PipelineIssue } from "./errors";
import { buildAction, mergeAction } from "./parse/action";
import { parseNodeAttrList } from "./parse/nodeAttr";
import { buildRecognition, collectRecognitionRefs, mergeRecognition } from "./parse/recognition";
import { readVariantPayload, withShorthand } from "./parse/variant";
import { actionParamKeys, isActionType } from "./schema/action";
import { NODE_KEYS, NODE_SCALAR_KEYS, nodeScalarSchema, type PipelineNode } from "./schema/node";
import { isRecognitionType, recognitionParamKeys } from "./schema/recognition";
import { expectObject, fail, parseWith } from "./validate";

/** Read access to the nodes already known, e.g. a resource's loaded pipeline. */
export type NodeTable = Pick<ReadonlyMap<string, PipelineNode>, "get" | "has">;

export const EMPTY_TABLE: NodeTable = new Map<string, PipelineNode>();

export function defaultNode(): PipelineNode {
  return {
    recognition: buildRecognition("DirectHit", {}, ["recognition"]),
    action: buildAction("DoNothing", {}, ["action"]),
    next: [],
    on_error: [],
    ...nodeScalarSchema.parse({}),
  };
}

/**
 * Applies `patch` on top of `existing` (or the defaults) and returns a new node.
 *
 * Present fields replace the old value. Recognition and action parameters are
 * overlaid field by field while the type stays the same and reset to the new
 * variant's defaults when it changes. Keys written directly on the node that
 * belong to neither are rejected.
 */
export function mergeNode(existing: PipelineNode | undefined, patch: unknown, name = ""): PipelineNode {
  const path = name ? [name] : [];
  const fields = expectObject(patch, path);
  const base = existing ?? defaultNode();

  const recognitionPayload = readVariantPayload(
    fields.recognition,
    base.recognition.type,
    isRecognitionType,
    [...path, "recognition"],
    "recognition",
  );
  const actionPayload = readVariantPayload(fields.action, base.action.type, isActionType, [...path, "action"], "action");

  const recognitionShorthand: Record<string, unknown> = {};
  const actionShorthand: Record<string, unknown> = {};
  const scalarPatch: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (NODE_SCALAR_KEYS.includes(key)) {
      scalarPatch[key] = value;
      continue;
    }
    if (NODE_KEYS.includes(key)) {
      continue;
    }

    const forRecognition = recognitionParamKeys[recognitionPayload.type].includes(key);
    const forAction = actionParamKeys[actionPayload.type].includes(key);
    if (!forRecognition && !forAction) {
      fail([...path, key], `unknown field "${key}"`);
    }
    if (forRecognition) {
      recognitionShorthand[key] = value;
    }
    if (forAction) {
      actionShorthand[key] = value;
    }
  }

  const recognition = mergeRecognition(base.recognition, withShorthand(recognitionPayload, recognitionShorthand), [
    ...path,
    "recognition",
  ]);
  const action = mergeAction(base.action, withShorthand(actionPayload, actionShorthand), [...path, "action"]);
  const scalars = parseWith(nodeScalarSchema, { ...base, ...scalarPatch }, path);

  return {
    recognition,
    action,
    next: "next" in fields ? parseNodeAttrList(fields.next, [...path, "next"]) : base.next.map((attr) => ({ ...attr })),
    on_error:
      "on_error" in fields
        ? parseNodeAttrList(fields.on_error, [...path, "on_error"])
        : base.on_error.map((attr) => ({ ...attr })),
    ...scalars,
  };
}

export function parseNode(value: unknown, name = ""): PipelineNode {
  return mergeNode(undefined, value, name);
}

/**
 * Merges every node of `patch` against `table` and checks references.
 * Either every node merges and the result holds them all, or an error is
 * thrown and nothing is returned.
 */
export function mergePipeline(table: NodeTable, patch: unknown): Map<string, PipelineNode> {
  const entries = expectObject(patch, []);
  const merged = new Map<string, PipelineNode>();
  const issues: PipelineIssue[] = [];

  for (const [name, nodePatch] of Object.entries(entries)) {
    if (!name) {
      issues.push({ path: "", message: "node name is empty" });
      continue;
    }
    try {
      merged.set(name, mergeNode(table.get(name), nodePatch, name));
    } catch (error) {
      if (!(error instanceof PipelineParseError)) {
        throw error;
      }
      issues.push(...error.issues);
    }
  }

  if (issues.length > 0) {
    throw new PipelineParseError(issues);
  }

  checkReferences(merged, table);
  return merged;
}

export function parsePipeline(value: unknown): Map<string, PipelineNode> {
  return mergePipeline(EMPTY_TABLE, value);
}

/** Replaces the whole `next` list of an existing node. */
export function overrideNext(table: NodeTable, name: string, next: unknown): PipelineNode {
  const existing = table.get(name);
  if (!existing) {
    return fail([name], `node "${name}" does not exist`);
  }

  const node = mergeNode(existing, { next }, name);
  checkReferences(new Map([[name, node]]), table);
  return node;
}

/**
 * Every non-anchor `next`/`on_error` entry and every composite member named
 * by `nodes` must exist in `nodes` or `table`.
 */
export function checkReferences(nodes: ReadonlyMap<string, PipelineNode>, table: NodeTable): void {
  const exists = (name: string) => nodes.has(name) || table.has(name);

  for (const [name, node] of nodes) {
    for (const field of ["next", "on_error"] as const) {
      for (const attr of node[field]) {
        if (!attr.anchor && !exists(attr.name)) {
          throw new PipelineReferenceError(name, field, attr.name);
        }
      }
    }
    for (const reference of collectRecognitionRefs(node.recognition)) {
      if (!exists(reference)) {
        throw new PipelineReferenceError(name, "recognition", reference);
      }
    }
  }
}

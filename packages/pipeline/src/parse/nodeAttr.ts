import { nodeAttrObjectSchema, type NodeAttr } from "../schema/node";
import { fail, parseWith, type FieldPath } from "../validate";

const ATTRIBUTE_TAG = /^\[([^\]]*)\]/;

/**
 * Parses one `next`/`on_error` entry. Strings may carry `[JumpBack]` and
 * `[Anchor]` prefixes in any order; objects use the explicit form.
 */
export function parseNodeAttr(value: unknown, path: FieldPath): NodeAttr {
  if (typeof value !== "string") {
    return parseWith(nodeAttrObjectSchema, value, path);
  }

  let name = value;
  let jumpBack = false;
  let anchor = false;
  let match = ATTRIBUTE_TAG.exec(name);
  while (match) {
    const tag = match[1];
    if (tag === "JumpBack") {
      jumpBack = true;
    } else if (tag === "Anchor") {
      anchor = true;
    } else {
      fail(path, `unknown node attribute "[${tag}]"`);
    }
    name = name.slice(match[0].length);
    match = ATTRIBUTE_TAG.exec(name);
  }

  if (!name) {
    fail(path, "node name is empty");
  }
  return { name, jump_back: jumpBack, anchor };
}

/** A single entry is accepted in place of a one-element list. */
export function parseNodeAttrList(value: unknown, path: FieldPath): NodeAttr[] {
  const entries: unknown[] = Array.isArray(value) ? value : [value];
  return entries.map((entry, index) => parseNodeAttr(entry, [...path, String(index)]));
}

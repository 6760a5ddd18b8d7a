import { z } from "zod";
import type { Action } from "./action";
import { intSchema, jsonValueSchema, rectSchema, scalarOrList, targetSchema, zeroRect } from "./common";
import type { Recognition } from "./recognition";

export const MAX_HIT = 4_294_967_295;

export const nodeAttrObjectSchema = z
  .object({
    name: z.string().min(1),
    jump_back: z.boolean().default(false),
    anchor: z.boolean().default(false),
  })
  .strict();

/** One entry of a `next` or `on_error` list. */
export type NodeAttr = z.output<typeof nodeAttrObjectSchema>;

export const waitFreezesObjectSchema = z
  .object({
    time: intSchema.min(0).default(1),
    target: targetSchema.default(true),
    target_offset: rectSchema.default(zeroRect),
    threshold: z.number().default(0.95),
    method: intSchema.default(5),
    rate_limit: intSchema.min(0).default(1000),
    timeout: intSchema.min(0).default(20_000),
  })
  .strict();

// A bare integer is shorthand for `{ "time": n }`.
export const waitFreezesSchema = z.preprocess(
  (value) => (typeof value === "number" ? { time: value } : value),
  waitFreezesObjectSchema,
);

export type WaitFreezes = z.output<typeof waitFreezesObjectSchema>;

export const nodeScalarSchema = z.object({
  rate_limit: intSchema.min(0).default(1000),
  timeout: intSchema.min(0).default(20_000),
  anchor: scalarOrList(z.string().min(1)).default(() => []),
  inverse: z.boolean().default(false),
  enabled: z.boolean().default(true),
  pre_delay: intSchema.min(0).default(200),
  post_delay: intSchema.min(0).default(200),
  pre_wait_freezes: waitFreezesSchema.nullable().default(null),
  post_wait_freezes: waitFreezesSchema.nullable().default(null),
  repeat: intSchema.min(1).default(1),
  repeat_delay: intSchema.min(0).default(0),
  repeat_wait_freezes: waitFreezesSchema.nullable().default(null),
  max_hit: intSchema.min(0).max(MAX_HIT).default(MAX_HIT),
  focus: jsonValueSchema.default(null),
  attach: jsonValueSchema.default(null),
});

export type NodeScalars = z.output<typeof nodeScalarSchema>;

export const NODE_SCALAR_KEYS: readonly string[] = Object.keys(nodeScalarSchema.shape);

export const NODE_KEYS: readonly string[] = [
  "recognition",
  "action",
  "next",
  "on_error",
  ...NODE_SCALAR_KEYS,
];

/** A fully-resolved pipeline node: every field carries a concrete value. */
export type PipelineNode = {
  recognition: Recognition;
  action: Action;
  next: NodeAttr[];
  on_error: NodeAttr[];
} & NodeScalars;

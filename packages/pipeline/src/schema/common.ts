import { z } from "zod";

export type Rect = [x: number, y: number, width: number, height: number];
export type Point = [x: number, y: number];

/**
 * Where an action or a region of interest points.
 *
 * `true` is the box recognized by the current node, a string names an
 * earlier node (or `[Anchor]` reference) whose box is reused, a point or
 * rectangle is taken literally.
 */
export type Target = boolean | string | Point | Rect;

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export const intSchema = z.number().int();

export const rectSchema = z.tuple([intSchema, intSchema, intSchema, intSchema]);

export const pointSchema = z.tuple([intSchema, intSchema]);

export const targetSchema = z.union([z.boolean(), z.string(), pointSchema, rectSchema]);

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

export function zeroRect(): Rect {
  return [0, 0, 0, 0];
}

/** Accepts either a list of `item` or a single `item`, always yielding a list. */
export function scalarOrList<T extends z.ZodTypeAny>(item: T) {
  return z.union([z.array(item), item.transform((value: z.output<T>) => [value])]);
}

export const roiFields = {
  roi: targetSchema.default(zeroRect),
  roi_offset: rectSchema.default(zeroRect),
};

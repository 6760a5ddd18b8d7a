import { jsonValueSchema } from "@sightline/pipeline";
import { z } from "zod";

const idSchema = z.number().int();

export const resourceLoadingDetailSchema = z.object({
  res_id: idSchema,
  hash: z.string(),
  path: z.string(),
});

export const controllerActionDetailSchema = z.object({
  ctrl_id: idSchema,
  uuid: z.string(),
  action: z.string(),
  param: jsonValueSchema.default(null),
});

export const taskerTaskDetailSchema = z.object({
  task_id: idSchema,
  entry: z.string(),
  uuid: z.string().default(""),
  hash: z.string().default(""),
});

export const nextListItemSchema = z.object({
  name: z.string(),
  jump_back: z.boolean().default(false),
  anchor: z.boolean().default(false),
});

export const nodeNextListDetailSchema = z.object({
  task_id: idSchema,
  name: z.string(),
  list: z.array(nextListItemSchema).default(() => []),
  focus: jsonValueSchema.default(null),
});

export const nodeRecognitionDetailSchema = z.object({
  task_id: idSchema,
  reco_id: idSchema,
  name: z.string(),
  focus: jsonValueSchema.default(null),
});

export const nodeActionDetailSchema = z.object({
  task_id: idSchema,
  action_id: idSchema,
  name: z.string(),
  focus: jsonValueSchema.default(null),
});

/** Also carried by the RecognitionNode and ActionNode trace events. */
export const nodePipelineNodeDetailSchema = z.object({
  task_id: idSchema,
  node_id: idSchema,
  name: z.string(),
  focus: jsonValueSchema.default(null),
});

export type ResourceLoadingDetail = z.output<typeof resourceLoadingDetailSchema>;
export type ControllerActionDetail = z.output<typeof controllerActionDetailSchema>;
export type TaskerTaskDetail = z.output<typeof taskerTaskDetailSchema>;
export type NextListItem = z.output<typeof nextListItemSchema>;
export type NodeNextListDetail = z.output<typeof nodeNextListDetailSchema>;
export type NodeRecognitionDetail = z.output<typeof nodeRecognitionDetailSchema>;
export type NodeActionDetail = z.output<typeof nodeActionDetailSchema>;
export type NodePipelineNodeDetail = z.output<typeof nodePipelineNodeDetailSchema>;

import { jsonValueSchema, rectSchema, type Rect } from "@sightline/pipeline";
import { z } from "zod";
import { HostProtocolError, describeError } from "../errors";
import {
  toJobStatus,
  type ActionDetailQuery,
  type CustomCallHandler,
  type GlobalOptionKey,
  type HostNotification,
  type HostRuntime,
  type JobScope,
  type JobStatus,
  type NodeDetailQuery,
  type NotificationListener,
  type RecognitionDetailQuery,
  type TaskDetailQuery,
} from "../host/types";
import { createLogger } from "../logging/logger";
import { HostInboundMethods, HostRpcMethods, type HostRpcMethod } from "./contracts";
import { HostClient, HostRpcError, JsonRpcErrorCodes } from "./hostClient";

const logger = createLogger("rpc");

const idSchema = z.number().int().min(0);

const taskDetailSchema = z
  .object({
    entry: z.string(),
    node_id_list: z.array(idSchema),
    status: z.number().int(),
  })
  .nullable();

const nodeDetailSchema = z
  .object({
    node_name: z.string(),
    reco_id: idSchema,
    action_id: idSchema,
    completed: z.boolean(),
  })
  .nullable();

const recognitionDetailSchema = z
  .object({
    node_name: z.string(),
    algorithm: z.string(),
    hit: z.boolean(),
    box: rectSchema,
    detail: z.string(),
    raw_image: z.string().nullable(),
    draw_images: z.array(z.string()),
  })
  .nullable();

const actionDetailSchema = z
  .object({
    node_name: z.string(),
    action: z.string(),
    box: rectSchema,
    success: z.boolean(),
    detail: z.string(),
  })
  .nullable();

const notificationSchema = z.object({
  source: z.enum(["resource", "controller", "tasker", "context"]),
  message: z.string(),
  detail: z.string(),
  task_id: idSchema.optional(),
});

const recognitionCallSchema = z.object({
  name: z.string(),
  task_id: idSchema,
  node_name: z.string(),
  param: jsonValueSchema,
  image: z.string(),
  roi: rectSchema,
});

const actionCallSchema = z.object({
  name: z.string(),
  task_id: idSchema,
  node_name: z.string(),
  param: jsonValueSchema,
  box: rectSchema,
  reco_id: idSchema,
  reco_detail: z.string(),
});

export interface RpcHostRuntimeOptions {
  /** Timeout for `job.wait`; 0 waits indefinitely. */
  waitTimeoutMs: number;
}

/** {@link HostRuntime} backed by a JSON-RPC host process. Images travel base64-encoded. */
export class RpcHostRuntime implements HostRuntime {
  private client: HostClient;
  private options: RpcHostRuntimeOptions;
  private listeners = new Set<NotificationListener>();
  private customHandler: CustomCallHandler | null = null;

  constructor(client: HostClient, options: RpcHostRuntimeOptions = { waitTimeoutMs: 0 }) {
    this.client = client;
    this.options = options;
    this.client.onNotification((method, params) => this.handleNotification(method, params));
    this.client.onRequest((method, params) => this.handleRequest(method, params));
  }

  async status(scope: JobScope, id: number): Promise<JobStatus> {
    return toJobStatus(await this.call(HostRpcMethods.jobStatus, { scope, id }, z.number().int()));
  }

  async wait(scope: JobScope, id: number): Promise<JobStatus> {
    const status = await this.call(HostRpcMethods.jobWait, { scope, id }, z.number().int(), this.options.waitTimeoutMs);
    return toJobStatus(status);
  }

  postTask(entry: string, pipelineOverride: string): Promise<number> {
    return this.call(HostRpcMethods.taskerPostTask, { entry, pipeline_override: pipelineOverride }, idSchema);
  }

  postRecognition(type: string, param: string, image: Buffer): Promise<number> {
    return this.call(
      HostRpcMethods.taskerPostRecognition,
      { type, param, image: image.toString("base64") },
      idSchema,
    );
  }

  postAction(type: string, param: string, box: Rect, recoDetail: string): Promise<number> {
    return this.call(HostRpcMethods.taskerPostAction, { type, param, box, reco_detail: recoDetail }, idSchema);
  }

  postStop(): Promise<number> {
    return this.call(HostRpcMethods.taskerPostStop, {}, idSchema);
  }

  overrideTaskPipeline(taskId: number, pipelineOverride: string): Promise<boolean> {
    return this.call(
      HostRpcMethods.taskerOverridePipeline,
      { task_id: taskId, pipeline_override: pipelineOverride },
      z.boolean(),
    );
  }

  running(): Promise<boolean> {
    return this.call(HostRpcMethods.taskerRunning, {}, z.boolean());
  }

  stopping(): Promise<boolean> {
    return this.call(HostRpcMethods.taskerStopping, {}, z.boolean());
  }

  clearCache(): Promise<boolean> {
    return this.call(HostRpcMethods.taskerClearCache, {}, z.boolean());
  }

  async getTaskDetail(taskId: number, nodeIdBuffer: number[] | null): Promise<TaskDetailQuery | null> {
    const detail = await this.call(HostRpcMethods.taskerGetTaskDetail, { task_id: taskId }, taskDetailSchema);
    if (!detail) {
      return null;
    }

    const size = detail.node_id_list.length;
    if (nodeIdBuffer) {
      if (nodeIdBuffer.length < size) {
        return null;
      }
      detail.node_id_list.forEach((nodeId, index) => {
        nodeIdBuffer[index] = nodeId;
      });
    }
    return { entry: detail.entry, node_id_list_size: size, status: toJobStatus(detail.status) };
  }

  getNodeDetail(nodeId: number): Promise<NodeDetailQuery | null> {
    return this.call(HostRpcMethods.taskerGetNodeDetail, { node_id: nodeId }, nodeDetailSchema);
  }

  async getRecognitionDetail(recoId: number): Promise<RecognitionDetailQuery | null> {
    const detail = await this.call(
      HostRpcMethods.taskerGetRecognitionDetail,
      { reco_id: recoId },
      recognitionDetailSchema,
    );
    if (!detail) {
      return null;
    }
    return {
      ...detail,
      raw_image: detail.raw_image === null ? null : Buffer.from(detail.raw_image, "base64"),
      draw_images: detail.draw_images.map((image) => Buffer.from(image, "base64")),
    };
  }

  getActionDetail(actionId: number): Promise<ActionDetailQuery | null> {
    return this.call(HostRpcMethods.taskerGetActionDetail, { action_id: actionId }, actionDetailSchema);
  }

  getLatestNode(nodeName: string): Promise<number | null> {
    return this.call(HostRpcMethods.taskerGetLatestNode, { node_name: nodeName }, idSchema.nullable());
  }

  postBundle(bundlePath: string): Promise<number> {
    return this.call(HostRpcMethods.resourcePostBundle, { path: bundlePath }, idSchema);
  }

  loaded(): Promise<boolean> {
    return this.call(HostRpcMethods.resourceLoaded, {}, z.boolean());
  }

  nodeList(): Promise<string[]> {
    return this.call(HostRpcMethods.resourceNodeList, {}, z.array(z.string()));
  }

  getNodeData(nodeName: string): Promise<string | null> {
    return this.call(HostRpcMethods.resourceGetNodeData, { node_name: nodeName }, z.string().nullable());
  }

  overridePipeline(pipelineOverride: string): Promise<boolean> {
    return this.call(HostRpcMethods.resourceOverridePipeline, { pipeline_override: pipelineOverride }, z.boolean());
  }

  resourceHash(): Promise<string | null> {
    return this.call(HostRpcMethods.resourceGetHash, {}, z.string().nullable());
  }

  clearResource(): Promise<boolean> {
    return this.call(HostRpcMethods.resourceClear, {}, z.boolean());
  }

  contextRunTask(taskId: number, entry: string, pipelineOverride: string): Promise<number> {
    return this.call(
      HostRpcMethods.contextRunTask,
      { task_id: taskId, entry, pipeline_override: pipelineOverride },
      idSchema,
      this.options.waitTimeoutMs,
    );
  }

  contextRunRecognition(taskId: number, type: string, param: string, image: Buffer): Promise<number> {
    return this.call(
      HostRpcMethods.contextRunRecognition,
      { task_id: taskId, type, param, image: image.toString("base64") },
      idSchema,
      this.options.waitTimeoutMs,
    );
  }

  contextRunAction(taskId: number, type: string, param: string, box: Rect, recoDetail: string): Promise<number> {
    return this.call(
      HostRpcMethods.contextRunAction,
      { task_id: taskId, type, param, box, reco_detail: recoDetail },
      idSchema,
      this.options.waitTimeoutMs,
    );
  }

  contextSetAnchor(taskId: number, anchor: string, nodeName: string): Promise<boolean> {
    return this.call(HostRpcMethods.contextSetAnchor, { task_id: taskId, anchor, node_name: nodeName }, z.boolean());
  }

  contextGetAnchor(taskId: number, anchor: string): Promise<string | null> {
    return this.call(HostRpcMethods.contextGetAnchor, { task_id: taskId, anchor }, z.string().nullable());
  }

  contextGetHitCount(taskId: number, nodeName: string): Promise<number> {
    return this.call(HostRpcMethods.contextGetHitCount, { task_id: taskId, node_name: nodeName }, idSchema);
  }

  contextClearHitCount(taskId: number, nodeName: string | null): Promise<boolean> {
    return this.call(HostRpcMethods.contextClearHitCount, { task_id: taskId, node_name: nodeName }, z.boolean());
  }

  registerCustomRecognition(name: string): Promise<boolean> {
    return this.call(HostRpcMethods.resourceRegisterCustomRecognition, { name }, z.boolean());
  }

  unregisterCustomRecognition(name: string): Promise<boolean> {
    return this.call(HostRpcMethods.resourceUnregisterCustomRecognition, { name }, z.boolean());
  }

  clearCustomRecognitions(): Promise<boolean> {
    return this.call(HostRpcMethods.resourceClearCustomRecognitions, {}, z.boolean());
  }

  registerCustomAction(name: string): Promise<boolean> {
    return this.call(HostRpcMethods.resourceRegisterCustomAction, { name }, z.boolean());
  }

  unregisterCustomAction(name: string): Promise<boolean> {
    return this.call(HostRpcMethods.resourceUnregisterCustomAction, { name }, z.boolean());
  }

  clearCustomActions(): Promise<boolean> {
    return this.call(HostRpcMethods.resourceClearCustomActions, {}, z.boolean());
  }

  setGlobalOption(key: GlobalOptionKey, value: string | number | boolean): Promise<boolean> {
    return this.call(HostRpcMethods.globalSetOption, { key, value }, z.boolean());
  }

  addNotificationListener(listener: NotificationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  setCustomCallHandler(handler: CustomCallHandler | null): void {
    this.customHandler = handler;
  }

  private async call<S extends z.ZodTypeAny>(
    method: HostRpcMethod,
    params: Record<string, unknown>,
    schema: S,
    timeoutMs?: number,
  ): Promise<z.output<S>> {
    const result = await this.client.request(method, params, timeoutMs);
    const parsed = schema.safeParse(result);
    if (!parsed.success) {
      throw new HostProtocolError(method, parsed.error.message);
    }
    return parsed.data;
  }

  private handleNotification(method: string, params: unknown): void {
    if (method !== HostInboundMethods.notify) {
      logger.debug(`Ignoring host notification ${method}`);
      return;
    }

    const parsed = notificationSchema.safeParse(params);
    if (!parsed.success) {
      logger.debug(`Ignoring malformed notify payload: ${parsed.error.message}`);
      return;
    }

    const notification: HostNotification = parsed.data;
    for (const listener of [...this.listeners]) {
      listener(notification);
    }
  }

  private async handleRequest(method: string, params: unknown): Promise<unknown> {
    const handler = this.customHandler;
    if (!handler) {
      throw new HostRpcError({ code: JsonRpcErrorCodes.methodNotFound, message: `No custom handler for ${method}` });
    }

    switch (method) {
      case HostInboundMethods.customRecognitionAnalyze: {
        const call = parseInbound(recognitionCallSchema, method, params);
        const reply = await handler.analyze({ ...call, image: Buffer.from(call.image, "base64") });
        return reply ? { hit: true, box: reply.box, detail: reply.detail } : { hit: false, box: null, detail: "" };
      }
      case HostInboundMethods.customActionRun: {
        const call = parseInbound(actionCallSchema, method, params);
        return { success: await handler.run(call) };
      }
      default:
        throw new HostRpcError({ code: JsonRpcErrorCodes.methodNotFound, message: `Unknown method ${method}` });
    }
  }
}

function parseInbound<S extends z.ZodTypeAny>(schema: S, method: string, params: unknown): z.output<S> {
  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    throw new HostRpcError({
      code: JsonRpcErrorCodes.invalidParams,
      message: `Invalid params for ${method}: ${describeError(parsed.error)}`,
    });
  }
  return parsed.data;
}

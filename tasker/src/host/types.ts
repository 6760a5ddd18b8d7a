import type { JsonValue, Rect } from "@sightline/pipeline";

export const JobStatus = {
  Invalid: 0,
  Pending: 1000,
  Running: 2000,
  Succeeded: 3000,
  Failed: 4000,
} as const;

export type JobStatus = (typeof JobStatus)[keyof typeof JobStatus];

const KNOWN_STATUSES: readonly JobStatus[] = Object.values(JobStatus);

export function toJobStatus(value: number): JobStatus {
  return KNOWN_STATUSES.find((status) => status === value) ?? JobStatus.Invalid;
}

export function isTerminal(status: JobStatus): boolean {
  return status === JobStatus.Succeeded || status === JobStatus.Failed;
}

export type JobScope = "resource" | "controller" | "tasker";

export type GlobalOptionKey =
  | "log_dir"
  | "save_draw"
  | "save_on_error"
  | "stdout_level"
  | "debug_mode"
  | "draw_quality"
  | "reco_image_cache_limit";

export interface TaskDetailQuery {
  entry: string;
  node_id_list_size: number;
  status: JobStatus;
}

export interface NodeDetailQuery {
  node_name: string;
  reco_id: number;
  action_id: number;
  completed: boolean;
}

export interface RecognitionDetailQuery {
  node_name: string;
  algorithm: string;
  hit: boolean;
  box: Rect;
  /** Raw JSON text as produced by the engine. */
  detail: string;
  raw_image: Buffer | null;
  draw_images: Buffer[];
}

export interface ActionDetailQuery {
  node_name: string;
  action: string;
  box: Rect;
  success: boolean;
  detail: string;
}

export type NotificationSource = "resource" | "controller" | "tasker" | "context";

export interface HostNotification {
  source: NotificationSource;
  message: string;
  detail: string;
  /** Task the notification belongs to, for context notifications. */
  task_id?: number;
}

export type NotificationListener = (notification: HostNotification) => void;

export interface CustomRecognitionCall {
  name: string;
  task_id: number;
  node_name: string;
  param: JsonValue;
  image: Buffer;
  roi: Rect;
}

export interface CustomRecognitionReply {
  box: Rect;
  detail: string;
}

export interface CustomActionCall {
  name: string;
  task_id: number;
  node_name: string;
  param: JsonValue;
  box: Rect;
  reco_id: number;
  reco_detail: string;
}

/** Answers the engine when a node runs a custom recognition or action. */
export interface CustomCallHandler {
  analyze(call: CustomRecognitionCall): Promise<CustomRecognitionReply | null>;
  run(call: CustomActionCall): Promise<boolean>;
}

/**
 * Flat, id-keyed surface of the external engine. Every result tree in this
 * package is assembled from these calls.
 */
export interface HostRuntime {
  status(scope: JobScope, id: number): Promise<JobStatus>;
  wait(scope: JobScope, id: number): Promise<JobStatus>;

  postTask(entry: string, pipelineOverride: string): Promise<number>;
  postRecognition(type: string, param: string, image: Buffer): Promise<number>;
  postAction(type: string, param: string, box: Rect, recoDetail: string): Promise<number>;
  postStop(): Promise<number>;
  overrideTaskPipeline(taskId: number, pipelineOverride: string): Promise<boolean>;
  running(): Promise<boolean>;
  stopping(): Promise<boolean>;
  clearCache(): Promise<boolean>;

  /**
   * With a `null` buffer only the list size is reported. Otherwise the node
   * ids are written into `nodeIdBuffer`; `null` is returned when it is too
   * small or when the task is unknown.
   */
  getTaskDetail(taskId: number, nodeIdBuffer: number[] | null): Promise<TaskDetailQuery | null>;
  getNodeDetail(nodeId: number): Promise<NodeDetailQuery | null>;
  getRecognitionDetail(recoId: number): Promise<RecognitionDetailQuery | null>;
  getActionDetail(actionId: number): Promise<ActionDetailQuery | null>;
  getLatestNode(nodeName: string): Promise<number | null>;

  postBundle(bundlePath: string): Promise<number>;
  loaded(): Promise<boolean>;
  nodeList(): Promise<string[]>;
  getNodeData(nodeName: string): Promise<string | null>;
  overridePipeline(pipelineOverride: string): Promise<boolean>;
  /** Hash of the loaded bundles, or `null` when the engine cannot report one. */
  resourceHash(): Promise<string | null>;
  clearResource(): Promise<boolean>;

  /*
   * Calls made from inside a custom handler. They run on the handler's task
   * and return only once the work is done.
   */
  contextRunTask(taskId: number, entry: string, pipelineOverride: string): Promise<number>;
  contextRunRecognition(taskId: number, type: string, param: string, image: Buffer): Promise<number>;
  contextRunAction(taskId: number, type: string, param: string, box: Rect, recoDetail: string): Promise<number>;
  contextSetAnchor(taskId: number, anchor: string, nodeName: string): Promise<boolean>;
  contextGetAnchor(taskId: number, anchor: string): Promise<string | null>;
  contextGetHitCount(taskId: number, nodeName: string): Promise<number>;
  /** A `null` node name clears every node's count. */
  contextClearHitCount(taskId: number, nodeName: string | null): Promise<boolean>;

  registerCustomRecognition(name: string): Promise<boolean>;
  unregisterCustomRecognition(name: string): Promise<boolean>;
  clearCustomRecognitions(): Promise<boolean>;
  registerCustomAction(name: string): Promise<boolean>;
  unregisterCustomAction(name: string): Promise<boolean>;
  clearCustomActions(): Promise<boolean>;

  setGlobalOption(key: GlobalOptionKey, value: string | number | boolean): Promise<boolean>;

  /** Returns a function that removes the listener. */
  addNotificationListener(listener: NotificationListener): () => void;
  setCustomCallHandler(handler: CustomCallHandler | null): void;
}

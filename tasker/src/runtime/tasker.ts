import {
  PipelineParseError,
  isPlainObject,
  mergePipeline,
  parseAction,
  parseRecognition,
  serializeAction,
  serializePipeline,
  serializeRecognition,
  type Rect,
} from "@sightline/pipeline";
import { defaultConfig, type HydrationConfig } from "../config/defaults";
import { DetailHydrator } from "../detail/hydrator";
import type { ActionDetail, NodeDetail, RecognitionDetail, TaskDetail } from "../detail/types";
import { HostCallError } from "../errors";
import type { HostRuntime } from "../host/types";
import { Job, JobWithResult, type TaskJob } from "../job/job";
import { createLogger } from "../logging/logger";
import type { ContextEvent, EngineEvent } from "../notification/events";
import { parseContextEvent, parseEvent } from "../notification/parse";
import { SinkRegistry, type EventSink, type NotificationCallback } from "../notification/sinks";
import type { Resource } from "./resource";
import { applyTaskOverride, createTaskJob } from "./taskJobs";

const logger = createLogger("tasker");

/**
 * Posts work to the engine and hands back jobs whose results are hydrated
 * into detail trees.
 */
export class Tasker {
  readonly resource: Resource;
  private host: HostRuntime;
  private hydrator: DetailHydrator;
  private sinks = new SinkRegistry<EngineEvent>("tasker", parseEvent);
  private contextSinks = new SinkRegistry<ContextEvent>("context", parseContextEvent);
  private unsubscribe: () => void;

  constructor(host: HostRuntime, resource: Resource, config: HydrationConfig = defaultConfig.hydration) {
    this.host = host;
    this.resource = resource;
    this.hydrator = new DetailHydrator(host, config);
    // Controller notifications come from the controller bound to this tasker.
    this.unsubscribe = host.addNotificationListener((notification) => {
      if (notification.source === "tasker" || notification.source === "controller") {
        this.sinks.dispatch(notification.message, notification.detail);
      } else if (notification.source === "context") {
        this.contextSinks.dispatch(notification.message, notification.detail);
      }
    });
  }

  /**
   * Runs the pipeline from `entry`. `pipelineOverride` is merged over the
   * resource's nodes for this task only.
   */
  async postTask(entry: string, pipelineOverride: unknown = {}): Promise<TaskJob<TaskDetail>> {
    const table = await this.resource.snapshot(isPlainObject(pipelineOverride) ? Object.keys(pipelineOverride) : []);
    const merged = mergePipeline(table, pipelineOverride);
    if (!merged.has(entry) && !table.has(entry)) {
      throw new PipelineParseError([{ path: "entry", message: `unknown node "${entry}"` }]);
    }

    const id = await this.host.postTask(entry, JSON.stringify(serializePipeline(merged)));
    if (id === 0) {
      throw new HostCallError("postTask", `engine rejected task "${entry}"`);
    }
    logger.debug(`Posted task ${entry} as ${id}`);
    return createTaskJob(this.host, this.resource, this.hydrator, id);
  }

  /** Runs one recognition on `image`, outside any pipeline. */
  async postRecognition(type: string, param: unknown, image: Buffer): Promise<JobWithResult<RecognitionDetail>> {
    const recognition = parseRecognition({ type, param }, ["recognition"]);
    const wire = serializeRecognition(recognition);
    const id = await this.host.postRecognition(wire.type, JSON.stringify(wire.param), image);
    if (id === 0) {
      throw new HostCallError("postRecognition", `engine rejected ${wire.type}`);
    }
    logger.debug(`Posted recognition ${wire.type} as ${id}`);
    return JobWithResult.withResult(this.host, "tasker", id, (recoId) => this.hydrator.fetchRecognition(recoId));
  }

  /** Runs one action at `box`, outside any pipeline. */
  async postAction(
    type: string,
    param: unknown,
    box: Rect,
    recoDetail = "",
  ): Promise<JobWithResult<ActionDetail>> {
    const action = parseAction({ type, param }, ["action"]);
    const wire = serializeAction(action);
    const id = await this.host.postAction(wire.type, JSON.stringify(wire.param), box, recoDetail);
    if (id === 0) {
      throw new HostCallError("postAction", `engine rejected ${wire.type}`);
    }
    logger.debug(`Posted action ${wire.type} as ${id}`);
    return JobWithResult.withResult(this.host, "tasker", id, (actionId) => this.hydrator.fetchAction(actionId));
  }

  /** Asks the engine to stop; running jobs end up Failed. */
  async postStop(): Promise<Job> {
    const id = await this.host.postStop();
    if (id === 0) {
      throw new HostCallError("postStop", "engine rejected the stop request");
    }
    return Job.forScope(this.host, "tasker", id);
  }

  overridePipeline(taskId: number, patch: unknown): Promise<void> {
    return applyTaskOverride(this.host, this.resource, taskId, patch);
  }

  running(): Promise<boolean> {
    return this.host.running();
  }

  stopping(): Promise<boolean> {
    return this.host.stopping();
  }

  clearCache(): Promise<boolean> {
    return this.host.clearCache();
  }

  getTaskJob(taskId: number): TaskJob<TaskDetail> {
    return createTaskJob(this.host, this.resource, this.hydrator, taskId);
  }

  getTaskDetail(taskId: number): Promise<TaskDetail | null> {
    return this.hydrator.fetchTask(taskId);
  }

  getRecognitionDetail(recoId: number): Promise<RecognitionDetail | null> {
    return this.hydrator.fetchRecognition(recoId);
  }

  getActionDetail(actionId: number): Promise<ActionDetail | null> {
    return this.hydrator.fetchAction(actionId);
  }

  /** Most recent execution of the named node, if it has run. */
  async getLatestNode(name: string): Promise<NodeDetail | null> {
    const nodeId = await this.host.getLatestNode(name);
    return nodeId ? this.hydrator.fetchNode(nodeId) : null;
  }

  addSink(callback: NotificationCallback): number {
    return this.sinks.add(callback);
  }

  addEventSink(sink: EventSink<EngineEvent>): number {
    return this.sinks.addEventSink(sink);
  }

  removeSink(id: number): boolean {
    return this.sinks.remove(id);
  }

  clearSinks(): void {
    this.sinks.clear();
  }

  addContextSink(callback: NotificationCallback): number {
    return this.contextSinks.add(callback);
  }

  addContextEventSink(sink: EventSink<ContextEvent>): number {
    return this.contextSinks.addEventSink(sink);
  }

  removeContextSink(id: number): boolean {
    return this.contextSinks.remove(id);
  }

  clearContextSinks(): void {
    this.contextSinks.clear();
  }

  dispose(): void {
    this.unsubscribe();
    this.sinks.clear();
    this.contextSinks.clear();
  }
}

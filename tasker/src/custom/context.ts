import {
  parseAction,
  parseRecognition,
  serializeAction,
  serializePipeline,
  serializeRecognition,
  type PipelineNode,
  type Rect,
} from "@sightline/pipeline";
import type { DetailHydrator } from "../detail/hydrator";
import type { ActionDetail, RecognitionDetail, TaskDetail } from "../detail/types";
import { HostCallError } from "../errors";
import type { HostRuntime } from "../host/types";
import type { TaskJob } from "../job/job";
import type { Resource } from "../runtime/resource";
import { applyTaskNextOverride, applyTaskOverride, createTaskJob } from "../runtime/taskJobs";

/**
 * Handed to custom handlers. Overrides made here apply to the running task
 * only; the resource's pipeline is left as it is.
 */
export class CustomContext {
  readonly taskId: number;
  private host: HostRuntime;
  private resource: Resource;
  private hydrator: DetailHydrator;

  constructor(host: HostRuntime, resource: Resource, hydrator: DetailHydrator, taskId: number) {
    this.host = host;
    this.resource = resource;
    this.hydrator = hydrator;
    this.taskId = taskId;
  }

  /** Long-running handlers should poll this and return early once it is true. */
  stopping(): Promise<boolean> {
    return this.host.stopping();
  }

  overridePipeline(patch: unknown): Promise<void> {
    return applyTaskOverride(this.host, this.resource, this.taskId, patch);
  }

  overrideNext(name: string, next: unknown): Promise<void> {
    return applyTaskNextOverride(this.host, this.resource, this.taskId, name, next);
  }

  getNodeObject(name: string): Promise<PipelineNode | null> {
    return this.resource.getNodeObject(name);
  }

  getTaskJob(): TaskJob<TaskDetail> {
    return createTaskJob(this.host, this.resource, this.hydrator, this.taskId);
  }

  /**
   * Runs the pipeline from `entry` inside this task and returns once it has
   * finished. `null` when the engine refuses to run it.
   */
  async runTask(entry: string, pipelineOverride: unknown = {}): Promise<TaskDetail | null> {
    const merged = await this.resource.resolvePatch(pipelineOverride);
    const id = await this.host.contextRunTask(this.taskId, entry, JSON.stringify(serializePipeline(merged)));
    return id === 0 ? null : this.hydrator.fetchTask(id);
  }

  async runRecognition(type: string, param: unknown, image: Buffer): Promise<RecognitionDetail | null> {
    const wire = serializeRecognition(parseRecognition({ type, param }, ["recognition"]));
    const id = await this.host.contextRunRecognition(this.taskId, wire.type, JSON.stringify(wire.param), image);
    return id === 0 ? null : this.hydrator.fetchRecognition(id);
  }

  async runAction(type: string, param: unknown, box: Rect, recoDetail = ""): Promise<ActionDetail | null> {
    const wire = serializeAction(parseAction({ type, param }, ["action"]));
    const id = await this.host.contextRunAction(this.taskId, wire.type, JSON.stringify(wire.param), box, recoDetail);
    return id === 0 ? null : this.hydrator.fetchAction(id);
  }

  /** Points `anchor` at `nodeName` for the rest of this task. */
  async setAnchor(anchor: string, nodeName: string): Promise<void> {
    if (!(await this.host.contextSetAnchor(this.taskId, anchor, nodeName))) {
      throw new HostCallError("setAnchor", `task ${this.taskId} did not accept anchor "${anchor}"`);
    }
  }

  getAnchor(anchor: string): Promise<string | null> {
    return this.host.contextGetAnchor(this.taskId, anchor);
  }

  /** How often `nodeName` has hit in this task so far. */
  getHitCount(nodeName: string): Promise<number> {
    return this.host.contextGetHitCount(this.taskId, nodeName);
  }

  async clearHitCount(nodeName: string): Promise<void> {
    if (!(await this.host.contextClearHitCount(this.taskId, nodeName))) {
      throw new HostCallError("clearHitCount", `task ${this.taskId} did not clear the hit count of "${nodeName}"`);
    }
  }

  async clearAllHitCounts(): Promise<void> {
    if (!(await this.host.contextClearHitCount(this.taskId, null))) {
      throw new HostCallError("clearAllHitCounts", `task ${this.taskId} did not clear its hit counts`);
    }
  }
}

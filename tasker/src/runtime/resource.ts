import {
  defaultActionParam,
  defaultRecognitionParam,
  isPlainObject,
  mergePipeline,
  overrideNext,
  readEngineNode,
  serializeNode,
  serializePipeline,
  type NodeTable,
  type PipelineNode,
} from "@sightline/pipeline";
import { defaultConfig, type HydrationConfig } from "../config/defaults";
import { CustomContext } from "../custom/context";
import { CustomRegistry, type ActionHandler, type RecognitionHandler } from "../custom/registry";
import { DetailHydrator } from "../detail/hydrator";
import { HostCallError, HostProtocolError, describeError } from "../errors";
import type { HostRuntime } from "../host/types";
import { Job } from "../job/job";
import { createLogger } from "../logging/logger";
import type { EngineEvent } from "../notification/events";
import { parseEvent } from "../notification/parse";
import { SinkRegistry, type EventSink, type NotificationCallback } from "../notification/sinks";

const logger = createLogger("resource");

/**
 * The engine's loaded pipeline and the custom handlers its nodes can call.
 * Node definitions live in the engine; this class reads and patches them.
 */
export class Resource {
  private host: HostRuntime;
  private hydrator: DetailHydrator;
  private custom = new CustomRegistry();
  private sinks = new SinkRegistry<EngineEvent>("resource", parseEvent);
  private unsubscribe: () => void;

  constructor(host: HostRuntime, config: HydrationConfig = defaultConfig.hydration) {
    this.host = host;
    this.hydrator = new DetailHydrator(host, config);
    this.unsubscribe = host.addNotificationListener((notification) => {
      if (notification.source === "resource") {
        this.sinks.dispatch(notification.message, notification.detail);
      }
    });
    host.setCustomCallHandler({
      analyze: (call) =>
        this.custom.analyze(this.contextFor(call.task_id), {
          taskId: call.task_id,
          nodeName: call.node_name,
          name: call.name,
          param: call.param,
          image: call.image,
          roi: call.roi,
        }),
      run: (call) =>
        this.custom.run(this.contextFor(call.task_id), {
          taskId: call.task_id,
          nodeName: call.node_name,
          name: call.name,
          param: call.param,
          box: call.box,
          recoId: call.reco_id,
          recoDetail: call.reco_detail,
        }),
    });
  }

  async postBundle(bundlePath: string): Promise<Job> {
    const id = await this.host.postBundle(bundlePath);
    if (id === 0) {
      throw new HostCallError("postBundle", `engine rejected bundle ${bundlePath}`);
    }
    logger.debug(`Loading bundle ${bundlePath} as job ${id}`);
    return Job.forScope(this.host, "resource", id);
  }

  loaded(): Promise<boolean> {
    return this.host.loaded();
  }

  nodeList(): Promise<string[]> {
    return this.host.nodeList();
  }

  /** Identifies the loaded bundles; changes whenever they do. */
  async hash(): Promise<string> {
    const hash = await this.host.resourceHash();
    if (hash === null) {
      throw new HostCallError("hash", "engine did not report a resource hash");
    }
    return hash;
  }

  /** Unloads every bundle and override. Custom handlers stay registered. */
  async clear(): Promise<void> {
    if (!(await this.host.clearResource())) {
      throw new HostCallError("clear", "engine refused to clear the resource");
    }
    logger.debug("Cleared loaded bundles");
  }

  getDefaultRecognitionParam(type: string): Record<string, unknown> | null {
    return defaultRecognitionParam(type);
  }

  getDefaultActionParam(type: string): Record<string, unknown> | null {
    return defaultActionParam(type);
  }

  /** The node's definition as JSON text, or `null` if there is no such node. */
  getNodeData(name: string): Promise<string | null> {
    return this.host.getNodeData(name);
  }

  async getNodeObject(name: string): Promise<PipelineNode | null> {
    const data = await this.host.getNodeData(name);
    if (data === null) {
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch (error) {
      throw new HostProtocolError("getNodeData", `node "${name}" is not valid JSON: ${describeError(error)}`);
    }
    return readEngineNode(json, name);
  }

  /**
   * Read view of the engine's nodes for merging: every name is known, and
   * `names` are loaded so patches can be merged over them.
   */
  async snapshot(names: readonly string[]): Promise<NodeTable> {
    const known = new Set(await this.host.nodeList());
    const nodes = new Map<string, PipelineNode>();
    for (const name of names) {
      if (!known.has(name)) {
        continue;
      }
      const node = await this.getNodeObject(name);
      if (node) {
        nodes.set(name, node);
      }
    }
    return {
      get: (name) => nodes.get(name),
      has: (name) => known.has(name),
    };
  }

  /** Merges `patch` over the current nodes without applying it. */
  async resolvePatch(patch: unknown): Promise<Map<string, PipelineNode>> {
    const table = await this.snapshot(isPlainObject(patch) ? Object.keys(patch) : []);
    return mergePipeline(table, patch);
  }

  /** Validates and merges the whole patch, then applies it. Nothing is applied on error. */
  async overridePipeline(patch: unknown): Promise<void> {
    const merged = await this.resolvePatch(patch);
    const accepted = await this.host.overridePipeline(JSON.stringify(serializePipeline(merged)));
    if (!accepted) {
      throw new HostCallError("overridePipeline", "engine rejected the pipeline override");
    }
  }

  async overrideNext(name: string, next: unknown): Promise<void> {
    const node = overrideNext(await this.snapshot([name]), name, next);
    const accepted = await this.host.overridePipeline(JSON.stringify({ [name]: serializeNode(node) }));
    if (!accepted) {
      throw new HostCallError("overrideNext", `engine rejected the next list of "${name}"`);
    }
  }

  /** Replaces any handler already registered under `name`. */
  async registerCustomRecognition(name: string, handler: RecognitionHandler): Promise<void> {
    this.custom.registerRecognition(name, handler);
    if (!(await this.host.registerCustomRecognition(name))) {
      this.custom.unregisterRecognition(name);
      throw new HostCallError("registerCustomRecognition", `engine rejected "${name}"`);
    }
  }

  async unregisterCustomRecognition(name: string): Promise<boolean> {
    const removed = this.custom.unregisterRecognition(name);
    await this.host.unregisterCustomRecognition(name);
    return removed;
  }

  async clearCustomRecognitions(): Promise<void> {
    this.custom.clearRecognitions();
    await this.host.clearCustomRecognitions();
  }

  customRecognitionList(): string[] {
    return this.custom.recognitionNames();
  }

  async registerCustomAction(name: string, handler: ActionHandler): Promise<void> {
    this.custom.registerAction(name, handler);
    if (!(await this.host.registerCustomAction(name))) {
      this.custom.unregisterAction(name);
      throw new HostCallError("registerCustomAction", `engine rejected "${name}"`);
    }
  }

  async unregisterCustomAction(name: string): Promise<boolean> {
    const removed = this.custom.unregisterAction(name);
    await this.host.unregisterCustomAction(name);
    return removed;
  }

  async clearCustomActions(): Promise<void> {
    this.custom.clearActions();
    await this.host.clearCustomActions();
  }

  customActionList(): string[] {
    return this.custom.actionNames();
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

  /** Detaches from the host: no more notifications or custom calls reach this resource. */
  dispose(): void {
    this.unsubscribe();
    this.host.setCustomCallHandler(null);
    this.sinks.clear();
  }

  private contextFor(taskId: number): CustomContext {
    return new CustomContext(this.host, this, this.hydrator, taskId);
  }
}

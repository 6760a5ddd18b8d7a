import { isActionType, isRecognitionType, jsonValueSchema, type JsonValue } from "@sightline/pipeline";
import { z } from "zod";
import type { HydrationConfig } from "../config/defaults";
import { RecognitionCycleError, describeError } from "../errors";
import type { HostRuntime, TaskDetailQuery } from "../host/types";
import { createLogger } from "../logging/logger";
import type { ActionDetail, NodeDetail, RecognitionDetail, TaskDetail } from "./types";

const logger = createLogger("hydrate");

const subResultSchema = z.object({ reco_id: z.number().int().positive() });

/** Engine detail payloads are JSON text; anything unreadable is kept as `null`. */
export function parseDetailPayload(raw: string): JsonValue {
  if (!raw) {
    return null;
  }
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    logger.debug(`Detail payload is not JSON: ${describeError(error)}`);
    return null;
  }
  const parsed = jsonValueSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/** Ids of the member recognitions listed in an And/Or detail payload, in order. */
export function subRecognitionIds(detail: JsonValue): number[] {
  if (!Array.isArray(detail)) {
    return [];
  }
  return detail.flatMap((item) => {
    const parsed = subResultSchema.safeParse(item);
    return parsed.success ? [parsed.data.reco_id] : [];
  });
}

/**
 * Builds result trees from the engine's flat, id-keyed queries:
 * task → nodes → recognition (→ composite members) and action.
 */
export class DetailHydrator {
  private host: HostRuntime;
  private config: HydrationConfig;

  constructor(host: HostRuntime, config: HydrationConfig) {
    this.host = host;
    this.config = config;
  }

  async fetchTask(taskId: number): Promise<TaskDetail | null> {
    const listing = await this.queryNodeIdList(taskId);
    if (!listing) {
      return null;
    }

    const nodes: (NodeDetail | null)[] = [];
    for (const nodeId of listing.nodeIds) {
      nodes.push(await this.fetchNodeInTask(taskId, nodeId));
    }

    return {
      task_id: taskId,
      entry: listing.query.entry,
      node_id_list: listing.nodeIds,
      status: listing.query.status,
      nodes,
    };
  }

  async fetchNode(nodeId: number): Promise<NodeDetail | null> {
    const query = await this.host.getNodeDetail(nodeId);
    if (!query) {
      return null;
    }

    return {
      node_id: nodeId,
      node_name: query.node_name,
      reco_id: query.reco_id,
      action_id: query.action_id,
      completed: query.completed,
      recognition: query.reco_id > 0 ? await this.fetchRecognition(query.reco_id) : null,
      action: query.action_id > 0 ? await this.fetchAction(query.action_id) : null,
    };
  }

  /**
   * `ancestors` holds the ids of the composite recognitions above this one;
   * meeting one of them again is a cycle.
   */
  async fetchRecognition(recoId: number, ancestors: readonly number[] = []): Promise<RecognitionDetail | null> {
    if (ancestors.includes(recoId)) {
      logger.warn(`Recognition cycle at ${recoId} (chain ${ancestors.join(" -> ")})`);
      throw new RecognitionCycleError(recoId, [...ancestors]);
    }

    const query = await this.host.getRecognitionDetail(recoId);
    if (!query) {
      return null;
    }

    const algorithm = isRecognitionType(query.algorithm) ? query.algorithm : "Unknown";
    const detail = parseDetailPayload(query.detail);
    const subDetails: RecognitionDetail[] = [];
    if (algorithm === "And" || algorithm === "Or") {
      const chain = [...ancestors, recoId];
      for (const subId of subRecognitionIds(detail)) {
        const sub = await this.fetchRecognition(subId, chain);
        if (sub) {
          subDetails.push(sub);
        }
      }
    }

    return {
      reco_id: recoId,
      node_name: query.node_name,
      algorithm,
      hit: query.hit,
      box_rect: query.box,
      detail,
      raw_image: query.raw_image,
      draw_images: query.draw_images,
      sub_details: subDetails,
    };
  }

  async fetchAction(actionId: number): Promise<ActionDetail | null> {
    const query = await this.host.getActionDetail(actionId);
    if (!query) {
      return null;
    }

    return {
      action_id: actionId,
      node_name: query.node_name,
      action: isActionType(query.action) ? query.action : "Unknown",
      box_rect: query.box,
      success: query.success,
      detail: parseDetailPayload(query.detail),
    };
  }

  // The list may grow between the size query and the fill query while the task runs.
  private async queryNodeIdList(taskId: number): Promise<{ query: TaskDetailQuery; nodeIds: number[] } | null> {
    for (let attempt = 0; attempt < this.config.maxListAttempts; attempt += 1) {
      const sizing = await this.host.getTaskDetail(taskId, null);
      if (!sizing) {
        return null;
      }

      const buffer = new Array<number>(sizing.node_id_list_size).fill(0);
      const filled = await this.host.getTaskDetail(taskId, buffer);
      if (filled) {
        return { query: filled, nodeIds: buffer.slice(0, filled.node_id_list_size) };
      }
      logger.debug(`Node list of task ${taskId} changed size, retrying`);
    }
    return null;
  }

  private async fetchNodeInTask(taskId: number, nodeId: number): Promise<NodeDetail | null> {
    try {
      return await this.fetchNode(nodeId);
    } catch (error) {
      logger.warn(`Could not hydrate node ${nodeId} of task ${taskId}: ${describeError(error)}`);
      return null;
    }
  }
}

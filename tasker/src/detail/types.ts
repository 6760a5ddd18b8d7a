import type { ActionType, JsonValue, Rect, RecognitionType } from "@sightline/pipeline";
import type { JobStatus } from "../host/types";

/** Algorithm names the engine reports that this package does not model become "Unknown". */
export type RecognitionAlgorithm = RecognitionType | "Unknown";

export type ActionKind = ActionType | "Unknown";

export interface RecognitionDetail {
  reco_id: number;
  node_name: string;
  algorithm: RecognitionAlgorithm;
  hit: boolean;
  box_rect: Rect;
  detail: JsonValue;
  raw_image: Buffer | null;
  draw_images: Buffer[];
  /** One entry per evaluated member of an And/Or recognition. */
  sub_details: RecognitionDetail[];
}

export interface ActionDetail {
  action_id: number;
  node_name: string;
  action: ActionKind;
  box_rect: Rect;
  success: boolean;
  detail: JsonValue;
}

export interface NodeDetail {
  node_id: number;
  node_name: string;
  reco_id: number;
  action_id: number;
  completed: boolean;
  recognition: RecognitionDetail | null;
  action: ActionDetail | null;
}

export interface TaskDetail {
  task_id: number;
  entry: string;
  node_id_list: number[];
  status: JobStatus;
  /** Parallel to `node_id_list`; `null` where a node's detail is not available. */
  nodes: (NodeDetail | null)[];
}

import type {
  ControllerActionDetail,
  NodeActionDetail,
  NodeNextListDetail,
  NodePipelineNodeDetail,
  NodeRecognitionDetail,
  ResourceLoadingDetail,
  TaskerTaskDetail,
} from "./details";

export type NotificationType = "Starting" | "Succeeded" | "Failed" | "Unknown";

export type EventPhase = Exclude<NotificationType, "Unknown">;

export type UnknownEvent = {
  kind: "Unknown";
  message: string;
  raw_json: string;
  /** Why the payload could not be decoded; `null` when the message itself is not recognized. */
  error: string | null;
};

export type NodeEvent =
  | { kind: "NodePipelineNode"; phase: EventPhase; detail: NodePipelineNodeDetail }
  | { kind: "NodeRecognition"; phase: EventPhase; detail: NodeRecognitionDetail }
  | { kind: "NodeAction"; phase: EventPhase; detail: NodeActionDetail }
  | { kind: "NodeNextList"; phase: EventPhase; detail: NodeNextListDetail }
  | { kind: "NodeRecognitionNode"; phase: EventPhase; detail: NodePipelineNodeDetail }
  | { kind: "NodeActionNode"; phase: EventPhase; detail: NodePipelineNodeDetail };

export type EngineEvent =
  | { kind: "ResourceLoading"; phase: EventPhase; detail: ResourceLoadingDetail }
  | { kind: "ControllerAction"; phase: EventPhase; detail: ControllerActionDetail }
  | { kind: "TaskerTask"; phase: EventPhase; detail: TaskerTaskDetail }
  | NodeEvent
  | UnknownEvent;

/** Events delivered while a task runs, scoped to its nodes. */
export type ContextEvent = NodeEvent | UnknownEvent;

export type EventKind = EngineEvent["kind"];

export const NotificationMessages = {
  resourceLoadingStarting: "Resource.Loading.Starting",
  resourceLoadingSucceeded: "Resource.Loading.Succeeded",
  resourceLoadingFailed: "Resource.Loading.Failed",
  controllerActionStarting: "Controller.Action.Starting",
  controllerActionSucceeded: "Controller.Action.Succeeded",
  controllerActionFailed: "Controller.Action.Failed",
  taskerTaskStarting: "Tasker.Task.Starting",
  taskerTaskSucceeded: "Tasker.Task.Succeeded",
  taskerTaskFailed: "Tasker.Task.Failed",
  nodePipelineNodeStarting: "Node.PipelineNode.Starting",
  nodePipelineNodeSucceeded: "Node.PipelineNode.Succeeded",
  nodePipelineNodeFailed: "Node.PipelineNode.Failed",
  nodeRecognitionStarting: "Node.Recognition.Starting",
  nodeRecognitionSucceeded: "Node.Recognition.Succeeded",
  nodeRecognitionFailed: "Node.Recognition.Failed",
  nodeActionStarting: "Node.Action.Starting",
  nodeActionSucceeded: "Node.Action.Succeeded",
  nodeActionFailed: "Node.Action.Failed",
  nodeNextListStarting: "Node.NextList.Starting",
  nodeNextListSucceeded: "Node.NextList.Succeeded",
  nodeNextListFailed: "Node.NextList.Failed",
  nodeRecognitionNodeStarting: "Node.RecognitionNode.Starting",
  nodeRecognitionNodeSucceeded: "Node.RecognitionNode.Succeeded",
  nodeRecognitionNodeFailed: "Node.RecognitionNode.Failed",
  nodeActionNodeStarting: "Node.ActionNode.Starting",
  nodeActionNodeSucceeded: "Node.ActionNode.Succeeded",
  nodeActionNodeFailed: "Node.ActionNode.Failed",
} as const;

export const HostRpcMethods = {
  jobStatus: "job.status",
  jobWait: "job.wait",
  taskerPostTask: "tasker.postTask",
  taskerPostRecognition: "tasker.postRecognition",
  taskerPostAction: "tasker.postAction",
  taskerPostStop: "tasker.postStop",
  taskerOverridePipeline: "tasker.overridePipeline",
  taskerRunning: "tasker.running",
  taskerStopping: "tasker.stopping",
  taskerClearCache: "tasker.clearCache",
  taskerGetTaskDetail: "tasker.getTaskDetail",
  taskerGetNodeDetail: "tasker.getNodeDetail",
  taskerGetRecognitionDetail: "tasker.getRecognitionDetail",
  taskerGetActionDetail: "tasker.getActionDetail",
  taskerGetLatestNode: "tasker.getLatestNode",
  resourcePostBundle: "resource.postBundle",
  resourceLoaded: "resource.loaded",
  resourceNodeList: "resource.nodeList",
  resourceGetNodeData: "resource.getNodeData",
  resourceOverridePipeline: "resource.overridePipeline",
  resourceGetHash: "resource.getHash",
  resourceClear: "resource.clear",
  resourceRegisterCustomRecognition: "resource.registerCustomRecognition",
  resourceUnregisterCustomRecognition: "resource.unregisterCustomRecognition",
  resourceClearCustomRecognitions: "resource.clearCustomRecognitions",
  resourceRegisterCustomAction: "resource.registerCustomAction",
  resourceUnregisterCustomAction: "resource.unregisterCustomAction",
  resourceClearCustomActions: "resource.clearCustomActions",
  contextRunTask: "context.runTask",
  contextRunRecognition: "context.runRecognition",
  contextRunAction: "context.runAction",
  contextSetAnchor: "context.setAnchor",
  contextGetAnchor: "context.getAnchor",
  contextGetHitCount: "context.getHitCount",
  contextClearHitCount: "context.clearHitCount",
  globalSetOption: "global.setOption",
} as const;

export type HostRpcMethod = (typeof HostRpcMethods)[keyof typeof HostRpcMethods];

/** Methods the host calls on us. */
export const HostInboundMethods = {
  notify: "notify",
  customRecognitionAnalyze: "custom.recognition.analyze",
  customActionRun: "custom.action.run",
} as const;

export type HostInboundMethod = (typeof HostInboundMethods)[keyof typeof HostInboundMethods];

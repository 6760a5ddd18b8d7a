export * from "./errors";
export * from "./merge";
export * from "./serialize";
export * from "./schema/common";
export * from "./schema/recognition";
export * from "./schema/action";
export * from "./schema/node";
export { buildAction, mergeAction, parseAction } from "./parse/action";
export { buildRecognition, collectRecognitionRefs, mergeRecognition, parseRecognition, parseRecognitionRef } from "./parse/recognition";
export { parseNodeAttr, parseNodeAttrList } from "./parse/nodeAttr";
export { readVariantPayload, type VariantPayload } from "./parse/variant";
export { isPlainObject } from "./validate";
export { pruneNodeData, readEngineNode } from "./lenient";
export { defaultActionParam, defaultRecognitionParam } from "./defaults";

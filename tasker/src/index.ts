export * from "./errors";
export * from "./host/types";
export * from "./config/defaults";
export * from "./config/globalOptions";
export * from "./logging/logger";
export * from "./job/job";
export * from "./detail/types";
export * from "./detail/hydrator";
export * from "./notification/events";
export * from "./notification/details";
export * from "./notification/parse";
export * from "./notification/sinks";
export * from "./custom/registry";
export * from "./custom/context";
export * from "./rpc/contracts";
export * from "./rpc/hostClient";
export * from "./rpc/rpcHostRuntime";
export * from "./runtime/resource";
export * from "./runtime/tasker";
export * from "./runtime/taskJobs";
export * from "./runtime/session";

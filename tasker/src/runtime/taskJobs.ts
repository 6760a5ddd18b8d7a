import { overrideNext, serializeNode, serializePipeline } from "@sightline/pipeline";
import type { DetailHydrator } from "../detail/hydrator";
import type { TaskDetail } from "../detail/types";
import { HostCallError } from "../errors";
import type { HostRuntime } from "../host/types";
import { TaskJob } from "../job/job";
import type { Resource } from "./resource";

/** Validates `patch` against the resource's nodes and applies it to one running task only. */
export async function applyTaskOverride(
  host: HostRuntime,
  resource: Resource,
  taskId: number,
  patch: unknown,
): Promise<void> {
  const merged = await resource.resolvePatch(patch);
  const accepted = await host.overrideTaskPipeline(taskId, JSON.stringify(serializePipeline(merged)));
  if (!accepted) {
    throw new HostCallError("overridePipeline", `task ${taskId} did not accept the override`);
  }
}

export async function applyTaskNextOverride(
  host: HostRuntime,
  resource: Resource,
  taskId: number,
  name: string,
  next: unknown,
): Promise<void> {
  const table = await resource.snapshot([name]);
  const node = overrideNext(table, name, next);
  const accepted = await host.overrideTaskPipeline(taskId, JSON.stringify({ [name]: serializeNode(node) }));
  if (!accepted) {
    throw new HostCallError("overrideNext", `task ${taskId} did not accept the next list of "${name}"`);
  }
}

export function createTaskJob(
  host: HostRuntime,
  resource: Resource,
  hydrator: DetailHydrator,
  taskId: number,
): TaskJob<TaskDetail> {
  return new TaskJob<TaskDetail>(
    taskId,
    (id) => host.status("tasker", id),
    (id) => host.wait("tasker", id),
    (id) => hydrator.fetchTask(id),
    (id, patch) => applyTaskOverride(host, resource, id, patch),
  );
}

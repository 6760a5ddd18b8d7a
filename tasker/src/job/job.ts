import { JobStatus, isTerminal, type HostRuntime, type JobScope } from "../host/types";

export type StatusQuery = (id: number) => Promise<JobStatus>;

/**
 * Handle to an operation the engine runs asynchronously. The job holds
 * only the id; status is always read from the engine.
 */
export class Job {
  readonly id: number;
  private statusQuery: StatusQuery;
  private waitQuery: StatusQuery;

  constructor(id: number, statusQuery: StatusQuery, waitQuery: StatusQuery) {
    this.id = id;
    this.statusQuery = statusQuery;
    this.waitQuery = waitQuery;
  }

  static forScope(host: HostRuntime, scope: JobScope, id: number): Job {
    return new Job(
      id,
      (jobId) => host.status(scope, jobId),
      (jobId) => host.wait(scope, jobId),
    );
  }

  status(): Promise<JobStatus> {
    return this.statusQuery(this.id);
  }

  /** Resolves once the job has succeeded or failed, with that status. */
  wait(): Promise<JobStatus> {
    return this.waitQuery(this.id);
  }

  async succeeded(): Promise<boolean> {
    return (await this.status()) === JobStatus.Succeeded;
  }

  async failed(): Promise<boolean> {
    return (await this.status()) === JobStatus.Failed;
  }

  async running(): Promise<boolean> {
    return (await this.status()) === JobStatus.Running;
  }

  async pending(): Promise<boolean> {
    return (await this.status()) === JobStatus.Pending;
  }

  async done(): Promise<boolean> {
    return isTerminal(await this.status());
  }
}

export type ResultQuery<T> = (id: number) => Promise<T | null>;

export class JobWithResult<T> extends Job {
  private resultQuery: ResultQuery<T>;

  constructor(id: number, statusQuery: StatusQuery, waitQuery: StatusQuery, resultQuery: ResultQuery<T>) {
    super(id, statusQuery, waitQuery);
    this.resultQuery = resultQuery;
  }

  static withResult<T>(host: HostRuntime, scope: JobScope, id: number, resultQuery: ResultQuery<T>): JobWithResult<T> {
    return new JobWithResult(
      id,
      (jobId) => host.status(scope, jobId),
      (jobId) => host.wait(scope, jobId),
      resultQuery,
    );
  }

  /**
   * Hydrated result for this job. `null` means the engine does not know the
   * id or has not produced the detail yet.
   */
  async get(wait = false): Promise<T | null> {
    if (wait) {
      await this.wait();
    }
    return this.resultQuery(this.id);
  }
}

export type PipelineOverrideFn = (id: number, patch: unknown) => Promise<void>;

/** A tasker job whose pipeline can still be patched while it runs. */
export class TaskJob<T> extends JobWithResult<T> {
  private overrideFn: PipelineOverrideFn;

  constructor(
    id: number,
    statusQuery: StatusQuery,
    waitQuery: StatusQuery,
    resultQuery: ResultQuery<T>,
    overrideFn: PipelineOverrideFn,
  ) {
    super(id, statusQuery, waitQuery, resultQuery);
    this.overrideFn = overrideFn;
  }

  overridePipeline(patch: unknown): Promise<void> {
    return this.overrideFn(this.id, patch);
  }
}

export interface PipelineIssue {
  path: string;
  message: string;
}

/** Raised when a node or override does not match the pipeline schema. Nothing is merged. */
export class PipelineParseError extends Error {
  issues: PipelineIssue[];

  constructor(issues: PipelineIssue[]) {
    super(issues.map((issue) => `${issue.path || "<root>"}: ${issue.message}`).join("; "));
    this.name = "PipelineParseError";
    this.issues = issues;
  }
}

/** Raised when `next`, `on_error` or a composite member names a node that does not exist. */
export class PipelineReferenceError extends Error {
  node: string;
  field: string;
  reference: string;

  constructor(node: string, field: string, reference: string) {
    super(`Node "${node}" references unknown node "${reference}" in ${field}`);
    this.name = "PipelineReferenceError";
    this.node = node;
    this.field = field;
    this.reference = reference;
  }
}

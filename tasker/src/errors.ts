/** A recognition id repeated within its own chain of composite parents. */
export class RecognitionCycleError extends Error {
  recoId: number;
  chain: number[];

  constructor(recoId: number, chain: number[]) {
    super(`Recognition ${recoId} appears in its own composite chain: ${[...chain, recoId].join(" -> ")}`);
    this.name = "RecognitionCycleError";
    this.recoId = recoId;
    this.chain = chain;
  }
}

/** The host accepted a call but reported that it could not carry it out. */
export class HostCallError extends Error {
  operation: string;

  constructor(operation: string, message: string) {
    super(`${operation}: ${message}`);
    this.name = "HostCallError";
    this.operation = operation;
  }
}

/** A host reply did not have the expected shape. */
export class HostProtocolError extends Error {
  method: string;

  constructor(method: string, message: string) {
    super(`Malformed reply to ${method}: ${message}`);
    this.name = "HostProtocolError";
    this.method = method;
  }
}

export class ConfigError extends Error {
  configPath: string;

  constructor(configPath: string, message: string) {
    super(`Invalid config ${configPath}: ${message}`);
    this.name = "ConfigError";
    this.configPath = configPath;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

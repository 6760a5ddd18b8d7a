import { spawn, type ChildProcessWithoutNullStreams } from "child_process";
import readline from "readline";
import { z } from "zod";
import type { HostProcessConfig } from "../config/defaults";
import { describeError } from "../errors";
import { createLogger } from "../logging/logger";

const logger = createLogger("rpc");

export interface JsonRpcErrorPayload {
  code: number;
  message: string;
  data?: unknown;
}

export class HostRpcError extends Error {
  code: number;
  data?: unknown;

  constructor(payload: JsonRpcErrorPayload) {
    super(payload.message);
    this.name = "HostRpcError";
    this.code = payload.code;
    this.data = payload.data;
  }
}

export const JsonRpcErrorCodes = {
  methodNotFound: -32601,
  invalidParams: -32602,
  internalError: -32603,
} as const;

const errorPayloadSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

const messageSchema = z.object({
  id: z.number().int().optional(),
  method: z.string().optional(),
  params: z.unknown().optional(),
  result: z.unknown().optional(),
  error: errorPayloadSchema.optional(),
});

export type SpawnHost = (config: HostProcessConfig) => ChildProcessWithoutNullStreams;

/** Serves a request the host sends us; the resolved value becomes the JSON-RPC result. */
export type InboundRequestHandler = (method: string, params: unknown) => Promise<unknown>;

export type InboundNotificationHandler = (method: string, params: unknown) => void;

type PendingRequest = {
  method: string;
  resolve: (value: unknown) => void;
  reject: (reason?: unknown) => void;
  timeoutId: NodeJS.Timeout | null;
};

/**
 * Newline-delimited JSON-RPC 2.0 over the stdio of the engine host process.
 * Traffic flows both ways: we call the engine, and the engine pushes
 * notifications and custom recognition/action requests back.
 */
export class HostClient {
  private config: HostProcessConfig;
  private spawnHost: SpawnHost;
  private process: ChildProcessWithoutNullStreams | null = null;
  private pending = new Map<number, PendingRequest>();
  private nextId = 1;
  private requestHandler: InboundRequestHandler | null = null;
  private notificationHandler: InboundNotificationHandler | null = null;

  constructor(config: HostProcessConfig, spawnHost: SpawnHost = defaultSpawn) {
    this.config = config;
    this.spawnHost = spawnHost;
  }

  onRequest(handler: InboundRequestHandler | null): void {
    this.requestHandler = handler;
  }

  onNotification(handler: InboundNotificationHandler | null): void {
    this.notificationHandler = handler;
  }

  /** Spawns the host and resolves once it is running; rejects if it cannot be spawned. */
  async start(): Promise<void> {
    if (this.process) {
      return;
    }

    const child = this.spawnHost(this.config);
    this.process = child;
    const rl = readline.createInterface({ input: child.stdout });

    rl.on("line", (line) => {
      this.handleLine(line);
    });

    child.stdin.on("error", (error) => {
      logger.warn(`Host stdin failed: ${describeError(error)}`);
      this.detach(child, `host stdin failed: ${describeError(error)}`);
    });

    child.on("exit", (code) => {
      logger.warn(`Host process exited with code ${code ?? "unknown"}`);
      this.detach(child, `host process exited with code ${code ?? "unknown"}`);
    });

    child.on("error", (error) => {
      logger.error(`Host process failed: ${describeError(error)}`);
      this.detach(child, `host process failed: ${describeError(error)}`);
    });

    await new Promise<void>((resolve, reject) => {
      const onSpawn = () => {
        child.off("error", onError);
        resolve();
      };
      const onError = (error: Error) => {
        child.off("spawn", onSpawn);
        reject(error);
      };
      child.once("spawn", onSpawn);
      child.once("error", onError);
    });
  }

  async stop(): Promise<void> {
    if (!this.process) {
      return;
    }

    this.process.kill();
    this.process = null;
  }

  get started(): boolean {
    return this.process !== null;
  }

  /**
   * Sends a request and resolves with its result. `timeoutMs` overrides the
   * configured request timeout; 0 disables it.
   */
  request(method: string, params: Record<string, unknown>, timeoutMs = this.config.requestTimeoutMs): Promise<unknown> {
    if (!this.process) {
      return Promise.reject(new Error("Host process is not started"));
    }

    const id = this.nextId++;
    this.write({ jsonrpc: "2.0", id, method, params });

    return new Promise((resolve, reject) => {
      const timeoutId =
        timeoutMs > 0
          ? setTimeout(() => {
              this.pending.delete(id);
              reject(new Error(`Request timed out: ${method}`));
            }, timeoutMs)
          : null;

      this.pending.set(id, { method, resolve, reject, timeoutId });
    });
  }

  private detach(child: ChildProcessWithoutNullStreams, reason: string): void {
    for (const pending of this.pending.values()) {
      if (pending.timeoutId) {
        clearTimeout(pending.timeoutId);
      }
      pending.reject(new Error(`${pending.method} aborted: ${reason}`));
    }
    this.pending.clear();
    if (this.process === child) {
      this.process = null;
    }
  }

  private write(payload: Record<string, unknown>): void {
    if (!this.process) {
      logger.debug("Dropping message for a stopped host process");
      return;
    }
    this.process.stdin.write(`${JSON.stringify(payload)}\n`);
  }

  private handleLine(line: string): void {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (error) {
      logger.debug(`Ignoring non-JSON line from host: ${line}`);
      return;
    }

    const parsed = messageSchema.safeParse(raw);
    if (!parsed.success) {
      logger.debug(`Ignoring malformed message from host: ${line}`);
      return;
    }

    const message = parsed.data;
    if (message.method !== undefined) {
      if (message.id === undefined) {
        this.handleNotification(message.method, message.params);
      } else {
        this.handleRequest(message.id, message.method, message.params);
      }
      return;
    }

    if (message.id === undefined) {
      return;
    }

    const pending = this.pending.get(message.id);
    if (!pending) {
      return;
    }

    this.pending.delete(message.id);
    if (pending.timeoutId) {
      clearTimeout(pending.timeoutId);
    }

    if (message.error) {
      pending.reject(new HostRpcError(message.error));
      return;
    }

    pending.resolve(message.result);
  }

  private handleNotification(method: string, params: unknown): void {
    if (!this.notificationHandler) {
      return;
    }
    try {
      this.notificationHandler(method, params);
    } catch (error) {
      logger.error(`Notification handler failed for ${method}: ${describeError(error)}`);
    }
  }

  private handleRequest(id: number, method: string, params: unknown): void {
    const handler = this.requestHandler;
    if (!handler) {
      this.write({
        jsonrpc: "2.0",
        id,
        error: { code: JsonRpcErrorCodes.methodNotFound, message: `No handler for ${method}` },
      });
      return;
    }

    Promise.resolve()
      .then(() => handler(method, params))
      .then((result) => {
        this.write({ jsonrpc: "2.0", id, result: result ?? null });
      })
      .catch((error: unknown) => {
        const code = error instanceof HostRpcError ? error.code : JsonRpcErrorCodes.internalError;
        logger.error(`Inbound ${method} failed: ${describeError(error)}`);
        this.write({ jsonrpc: "2.0", id, error: { code, message: describeError(error) } });
      });
  }
}

function defaultSpawn(config: HostProcessConfig): ChildProcessWithoutNullStreams {
  return spawn(config.executable, config.args, {
    stdio: "pipe",
    env: {
      ...process.env,
      ...config.env,
    },
  });
}

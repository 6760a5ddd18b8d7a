import type { ChildProcessWithoutNullStreams } from "child_process";
import { EventEmitter } from "events";
import { PassThrough } from "stream";

/**
 * Stands in for the spawned engine host. It reports `spawn` once the client
 * listens for it, unless built with `spawns: false`; `failToSpawn` then plays
 * the error Node raises for a missing executable.
 */
export class FakeHostProcess extends EventEmitter {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  killed = false;

  constructor(options: { spawns?: boolean } = {}) {
    super();
    if (options.spawns ?? true) {
      const announce = (event: string | symbol) => {
        if (event === "spawn") {
          this.off("newListener", announce);
          setImmediate(() => this.emit("spawn"));
        }
      };
      this.on("newListener", announce);
    }
  }

  kill(): boolean {
    this.killed = true;
    this.emit("exit", 0);
    return true;
  }

  failToSpawn(executable: string): void {
    this.emit("error", Object.assign(new Error(`spawn ${executable} ENOENT`), { code: "ENOENT" }));
  }

  asChild(): ChildProcessWithoutNullStreams {
    return this as unknown as ChildProcessWithoutNullStreams;
  }
}

export function createFakeProcess(options: { spawns?: boolean } = {}) {
  const host = new FakeHostProcess(options);
  return { host, fakeProcess: host.asChild(), stdin: host.stdin, stdout: host.stdout, stderr: host.stderr };
}

export type WireMessage = {
  id?: number;
  method?: string;
  params?: any;
  result?: unknown;
  error?: { code: number; message: string };
};

export function createLineReader(stream: PassThrough) {
  let buffer = "";
  const queue: ((line: string) => void)[] = [];

  const takeLine = () => {
    const index = buffer.indexOf("\n");
    const line = buffer.slice(0, index);
    buffer = buffer.slice(index + 1);
    return line;
  };

  stream.on("data", (chunk) => {
    buffer += chunk.toString();
    while (buffer.includes("\n") && queue.length > 0) {
      const resolve = queue.shift();
      if (resolve) {
        resolve(takeLine());
      }
    }
  });

  const nextLine = () =>
    new Promise<string>((resolve) => {
      if (buffer.includes("\n")) {
        resolve(takeLine());
        return;
      }
      queue.push(resolve);
    });

  return {
    nextLine,
    nextMessage: async (): Promise<WireMessage> => JSON.parse(await nextLine()),
  };
}

import { describe, expect, it } from "vitest";
import { defaultConfig } from "../src/config/defaults";
import { HostCallError } from "../src/errors";
import { openSession } from "../src/runtime/session";
import { createFakeProcess, createLineReader } from "./_helpers/fakeProcess";

function fakeEngine(acceptOptions: boolean) {
  const { host, fakeProcess, stdin, stdout } = createFakeProcess();
  const reader = createLineReader(stdin);
  const methods: string[] = [];
  let exited = false;
  host.on("exit", () => {
    exited = true;
  });

  const serve = async (count: number) => {
    for (let index = 0; index < count; index += 1) {
      const request = await reader.nextMessage();
      methods.push(`${request.method}:${request.params?.key ?? ""}`);
      stdout.write(JSON.stringify({ jsonrpc: "2.0", id: request.id, result: acceptOptions }) + "\n");
    }
  };

  return { spawn: () => fakeProcess, serve, methods, exited: () => exited };
}

describe("openSession", () => {
  it("applies the global options and closes the host process", async () => {
    const engine = fakeEngine(true);
    const serving = engine.serve(7);

    const session = await openSession(defaultConfig, engine.spawn);
    await serving;

    expect(engine.methods).toEqual([
      "global.setOption:log_dir",
      "global.setOption:save_draw",
      "global.setOption:save_on_error",
      "global.setOption:stdout_level",
      "global.setOption:debug_mode",
      "global.setOption:draw_quality",
      "global.setOption:reco_image_cache_limit",
    ]);
    expect(session.resource).toBe(session.tasker.resource);

    await session.close();
    expect(engine.exited()).toBe(true);
  });

  it("stops the host process when an option is rejected", async () => {
    const engine = fakeEngine(false);
    const serving = engine.serve(1);

    await expect(openSession(defaultConfig, engine.spawn)).rejects.toBeInstanceOf(HostCallError);
    await serving;
    expect(engine.exited()).toBe(true);
  });

  it("rejects when the host executable cannot be spawned", async () => {
    const { host, fakeProcess } = createFakeProcess({ spawns: false });
    const config = { ...defaultConfig, host: { ...defaultConfig.host, executable: "/missing/sightline-host" } };

    const opening = openSession(config, () => fakeProcess);
    host.failToSpawn(config.host.executable);

    await expect(opening).rejects.toThrow("spawn /missing/sightline-host ENOENT");
  });
});

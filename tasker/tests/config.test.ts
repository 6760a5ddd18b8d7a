import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, describe, expect, it } from "vitest";
import { defaultConfig, loadConfig } from "../src/config/defaults";
import { applyGlobalOptions, toHostOptions } from "../src/config/globalOptions";
import { ConfigError, HostCallError } from "../src/errors";
import { FakeHost } from "./_helpers/fakeHost";

const tempDirs: string[] = [];

function writeConfig(contents: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "sightline-config-"));
  tempDirs.push(dir);
  const file = path.join(dir, "engine.json");
  fs.writeFileSync(file, contents);
  return file;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("loadConfig", () => {
  it("returns a copy of the defaults without a path", () => {
    const config = loadConfig();

    expect(config).toEqual(defaultConfig);
    expect(config.host.args).not.toBe(defaultConfig.host.args);
  });

  it("merges each section over the defaults", () => {
    const file = writeConfig(
      JSON.stringify({ host: { executable: "/opt/engine/host" }, global: { debugMode: true, drawQuality: 50 } }),
    );

    const config = loadConfig(file);

    expect(config.host).toEqual({ ...defaultConfig.host, executable: "/opt/engine/host" });
    expect(config.global).toEqual({ ...defaultConfig.global, debugMode: true, drawQuality: 50 });
    expect(config.hydration).toEqual(defaultConfig.hydration);
  });

  it("rejects files that are not JSON", () => {
    const file = writeConfig("{ host: ");

    expect(() => loadConfig(file)).toThrow(ConfigError);
  });

  it("names the offending fields", () => {
    const file = writeConfig(JSON.stringify({ global: { drawQuality: 150 }, hydration: { retries: 2 } }));

    expect(() => loadConfig(file)).toThrow(/global\.drawQuality/);
    expect(() => loadConfig(file)).toThrow(/hydration: Unrecognized key\(s\) in object: 'retries'/);
  });
});

describe("applyGlobalOptions", () => {
  it("sends every option with host keys and the numeric stdout level", async () => {
    const host = new FakeHost();

    await applyGlobalOptions(host, { ...defaultConfig.global, stdoutLevel: "debug" });

    expect(host.globalOptions).toEqual([
      ["log_dir", "debug"],
      ["save_draw", false],
      ["save_on_error", true],
      ["stdout_level", 5],
      ["debug_mode", false],
      ["draw_quality", 85],
      ["reco_image_cache_limit", 4096],
    ]);
  });

  it("maps the stdout levels from off to all", () => {
    const levelOf = (stdoutLevel: typeof defaultConfig.global.stdoutLevel) =>
      toHostOptions({ ...defaultConfig.global, stdoutLevel }).find(([key]) => key === "stdout_level")?.[1];

    expect(levelOf("off")).toBe(0);
    expect(levelOf("error")).toBe(2);
    expect(levelOf("all")).toBe(7);
  });

  it("fails when the engine rejects an option", async () => {
    const host = new FakeHost();
    host.accept = false;

    await expect(applyGlobalOptions(host, defaultConfig.global)).rejects.toBeInstanceOf(HostCallError);
    expect(host.globalOptions).toHaveLength(1);
  });
});

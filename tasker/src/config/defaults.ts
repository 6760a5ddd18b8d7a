import fs from "fs";
import path from "path";
import { z } from "zod";
import { ConfigError } from "../errors";

export interface HostProcessConfig {
  executable: string;
  args: string[];
  requestTimeoutMs: number;
  /** Upper bound for a single `wait()` round trip; 0 waits indefinitely. */
  waitTimeoutMs: number;
  env: Record<string, string>;
}

export type StdoutLevel = "off" | "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "all";

export interface GlobalOptions {
  logDir: string;
  saveDraw: boolean;
  saveOnError: boolean;
  stdoutLevel: StdoutLevel;
  debugMode: boolean;
  drawQuality: number;
  recoImageCacheLimit: number;
}

export interface HydrationConfig {
  maxListAttempts: number;
}

export interface EngineConfig {
  host: HostProcessConfig;
  global: GlobalOptions;
  hydration: HydrationConfig;
}

export const defaultConfig: EngineConfig = {
  host: {
    executable: "sightline-host",
    args: ["--stdio"],
    requestTimeoutMs: 10_000,
    waitTimeoutMs: 0,
    env: {},
  },
  global: {
    logDir: "debug",
    saveDraw: false,
    saveOnError: true,
    stdoutLevel: "error",
    debugMode: false,
    drawQuality: 85,
    recoImageCacheLimit: 4096,
  },
  hydration: {
    maxListAttempts: 3,
  },
};

const configFileSchema = z
  .object({
    host: z
      .object({
        executable: z.string().min(1),
        args: z.array(z.string()),
        requestTimeoutMs: z.number().int().positive(),
        waitTimeoutMs: z.number().int().min(0),
        env: z.record(z.string()),
      })
      .partial()
      .strict(),
    global: z
      .object({
        logDir: z.string(),
        saveDraw: z.boolean(),
        saveOnError: z.boolean(),
        stdoutLevel: z.enum(["off", "fatal", "error", "warn", "info", "debug", "trace", "all"]),
        debugMode: z.boolean(),
        drawQuality: z.number().int().min(0).max(100),
        recoImageCacheLimit: z.number().int().min(0),
      })
      .partial()
      .strict(),
    hydration: z
      .object({
        maxListAttempts: z.number().int().min(1),
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

export function loadConfig(configPath?: string): EngineConfig {
  if (!configPath) {
    return structuredClone(defaultConfig);
  }

  const resolved = path.resolve(configPath);
  const raw = fs.readFileSync(resolved, "utf-8");
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(resolved, error instanceof Error ? error.message : String(error));
  }

  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(resolved, details.join("; "));
  }

  return {
    host: {
      ...defaultConfig.host,
      ...(parsed.data.host ?? {}),
    },
    global: {
      ...defaultConfig.global,
      ...(parsed.data.global ?? {}),
    },
    hydration: {
      ...defaultConfig.hydration,
      ...(parsed.data.hydration ?? {}),
    },
  };
}

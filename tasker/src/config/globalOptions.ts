import { HostCallError } from "../errors";
import type { GlobalOptionKey, HostRuntime } from "../host/types";
import type { GlobalOptions, StdoutLevel } from "./defaults";

export const StdoutLevels: Record<StdoutLevel, number> = {
  off: 0,
  fatal: 1,
  error: 2,
  warn: 3,
  info: 4,
  debug: 5,
  trace: 6,
  all: 7,
};

/** Host-side key and value for each option, in the order they are sent. */
export function toHostOptions(options: GlobalOptions): [GlobalOptionKey, string | number | boolean][] {
  return [
    ["log_dir", options.logDir],
    ["save_draw", options.saveDraw],
    ["save_on_error", options.saveOnError],
    ["stdout_level", StdoutLevels[options.stdoutLevel]],
    ["debug_mode", options.debugMode],
    ["draw_quality", options.drawQuality],
    ["reco_image_cache_limit", options.recoImageCacheLimit],
  ];
}

export async function applyGlobalOptions(host: HostRuntime, options: GlobalOptions): Promise<void> {
  for (const [key, value] of toHostOptions(options)) {
    if (!(await host.setGlobalOption(key, value))) {
      throw new HostCallError("setGlobalOption", `engine rejected ${key}=${String(value)}`);
    }
  }
}

import type { JsonValue, Rect } from "@sightline/pipeline";
import { describeError } from "../errors";
import { createLogger } from "../logging/logger";
import type { CustomContext } from "./context";

const logger = createLogger("custom");

export interface AnalyzeArgs {
  taskId: number;
  nodeName: string;
  /** Name the handler was registered under. */
  name: string;
  param: JsonValue;
  image: Buffer;
  roi: Rect;
}

export interface AnalyzeResult {
  box: Rect;
  detail: string;
}

export interface RecognitionHandler {
  /** Returns the matched box and a detail string, or `null` for no match. */
  analyze(context: CustomContext, args: AnalyzeArgs): AnalyzeResult | null | Promise<AnalyzeResult | null>;
}

export interface RunArgs {
  taskId: number;
  nodeName: string;
  name: string;
  param: JsonValue;
  box: Rect;
  recoId: number;
  recoDetail: string;
}

export interface ActionHandler {
  run(context: CustomContext, args: RunArgs): boolean | Promise<boolean>;
}

/**
 * Handlers for `Custom` recognitions and actions, by name. A handler stays
 * registered until it is unregistered or the registry is cleared.
 */
export class CustomRegistry {
  private recognitions = new Map<string, RecognitionHandler>();
  private actions = new Map<string, ActionHandler>();

  registerRecognition(name: string, handler: RecognitionHandler): void {
    this.recognitions.set(name, handler);
  }

  unregisterRecognition(name: string): boolean {
    return this.recognitions.delete(name);
  }

  clearRecognitions(): void {
    this.recognitions.clear();
  }

  recognitionNames(): string[] {
    return [...this.recognitions.keys()];
  }

  registerAction(name: string, handler: ActionHandler): void {
    this.actions.set(name, handler);
  }

  unregisterAction(name: string): boolean {
    return this.actions.delete(name);
  }

  clearActions(): void {
    this.actions.clear();
  }

  actionNames(): string[] {
    return [...this.actions.keys()];
  }

  async analyze(context: CustomContext, args: AnalyzeArgs): Promise<AnalyzeResult | null> {
    const handler = this.recognitions.get(args.name);
    if (!handler) {
      logger.warn(`No custom recognition registered as "${args.name}"`);
      return null;
    }

    try {
      return await handler.analyze(context, args);
    } catch (error) {
      logger.error(`Custom recognition "${args.name}" failed on node ${args.nodeName}: ${describeError(error)}`);
      return null;
    }
  }

  async run(context: CustomContext, args: RunArgs): Promise<boolean> {
    const handler = this.actions.get(args.name);
    if (!handler) {
      logger.warn(`No custom action registered as "${args.name}"`);
      return false;
    }

    try {
      return await handler.run(context, args);
    } catch (error) {
      logger.error(`Custom action "${args.name}" failed on node ${args.nodeName}: ${describeError(error)}`);
      return false;
    }
  }
}

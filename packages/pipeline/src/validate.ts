import { z } from "zod";
import { PipelineParseError } from "./errors";

export type FieldPath = readonly string[];

export function joinPath(path: FieldPath): string {
  return path.join(".");
}

export function fail(path: FieldPath, message: string): never {
  throw new PipelineParseError([{ path: joinPath(path), message }]);
}

export function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown, path: FieldPath): z.output<S> {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  throw new PipelineParseError(
    result.error.issues.map((issue) => ({
      path: joinPath([...path, ...issue.path.map(String)]),
      message: issue.message,
    })),
  );
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function expectObject(value: unknown, path: FieldPath): Record<string, unknown> {
  if (!isPlainObject(value)) {
    return fail(path, "expected an object");
  }
  return value;
}

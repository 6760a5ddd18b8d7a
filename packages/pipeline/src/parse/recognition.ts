import {
  andParamSchema,
  colorMatchParamSchema,
  customRecognitionParamSchema,
  directHitParamSchema,
  featureMatchParamSchema,
  isRecognitionType,
  neuralNetworkClassifyParamSchema,
  neuralNetworkDetectParamSchema,
  ocrParamSchema,
  orParamSchema,
  recognitionParamKeys,
  templateMatchParamSchema,
  type Recognition,
  type RecognitionRef,
  type RecognitionType,
} from "../schema/recognition";
import { serializeRecognition } from "../serialize";
import { expectObject, fail, parseWith, type FieldPath } from "../validate";
import { readVariantPayload, type VariantPayload } from "./variant";

export function buildRecognition(
  type: RecognitionType,
  raw: Record<string, unknown>,
  path: FieldPath,
): Recognition {
  switch (type) {
    case "DirectHit":
      return { type, param: parseWith(directHitParamSchema, raw, path) };
    case "TemplateMatch":
      return { type, param: parseWith(templateMatchParamSchema, raw, path) };
    case "FeatureMatch":
      return { type, param: parseWith(featureMatchParamSchema, raw, path) };
    case "ColorMatch":
      return { type, param: parseWith(colorMatchParamSchema, raw, path) };
    case "OCR":
      return { type, param: parseWith(ocrParamSchema, raw, path) };
    case "NeuralNetworkClassify":
      return { type, param: parseWith(neuralNetworkClassifyParamSchema, raw, path) };
    case "NeuralNetworkDetect":
      return { type, param: parseWith(neuralNetworkDetectParamSchema, raw, path) };
    case "Custom":
      return { type, param: parseWith(customRecognitionParamSchema, raw, path) };
    case "And": {
      const param = parseWith(andParamSchema, raw, path);
      return {
        type,
        param: {
          all_of: param.all_of.map((entry, index) =>
            parseRecognitionRef(entry, [...path, "all_of", String(index)]),
          ),
          box_index: param.box_index,
        },
      };
    }
    case "Or": {
      const param = parseWith(orParamSchema, raw, path);
      return {
        type,
        param: {
          any_of: param.any_of.map((entry, index) =>
            parseRecognitionRef(entry, [...path, "any_of", String(index)]),
          ),
        },
      };
    }
  }
}

/**
 * Same type as `previous`: the payload overlays the previous parameters.
 * Different type (or no previous): the variant starts from its defaults.
 */
export function mergeRecognition(
  previous: Recognition | undefined,
  payload: VariantPayload<RecognitionType>,
  path: FieldPath,
): Recognition {
  const inherited = previous && previous.type === payload.type ? serializeRecognition(previous).param : {};
  return buildRecognition(payload.type, { ...inherited, ...payload.param }, [...path, "param"]);
}

export function parseRecognition(value: unknown, path: FieldPath = []): Recognition {
  return mergeRecognition(undefined, readVariantPayload(value, "DirectHit", isRecognitionType, path, "recognition"), path);
}

/**
 * A composite member: a node name, `{ type, param }`, or a node-style
 * object `{ "recognition": ..., <param keys> }`.
 */
export function parseRecognitionRef(value: unknown, path: FieldPath): RecognitionRef {
  if (typeof value === "string") {
    if (!value) {
      fail(path, "node name is empty");
    }
    return value;
  }

  const entry = expectObject(value, path);
  if (!("recognition" in entry)) {
    return parseRecognition(entry, path);
  }

  const { recognition, ...shorthand } = entry;
  const payload = readVariantPayload(recognition, "DirectHit", isRecognitionType, [...path, "recognition"], "recognition");
  const keys = recognitionParamKeys[payload.type];
  for (const key of Object.keys(shorthand)) {
    if (!keys.includes(key)) {
      fail([...path, key], `"${key}" is not a parameter of ${payload.type}`);
    }
  }
  return mergeRecognition(undefined, { type: payload.type, param: { ...shorthand, ...payload.param } }, [
    ...path,
    "recognition",
  ]);
}

/** Node names a recognition depends on through composite members, depth first. */
export function collectRecognitionRefs(recognition: Recognition): string[] {
  const members =
    recognition.type === "And"
      ? recognition.param.all_of
      : recognition.type === "Or"
        ? recognition.param.any_of
        : [];
  return members.flatMap((member) => (typeof member === "string" ? [member] : collectRecognitionRefs(member)));
}

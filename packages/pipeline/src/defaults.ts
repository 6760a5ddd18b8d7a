import type { z } from "zod";
import {
  appParamSchema,
  clickKeyParamSchema,
  clickParamSchema,
  commandParamSchema,
  customActionParamSchema,
  doNothingParamSchema,
  inputTextParamSchema,
  isActionType,
  keyParamSchema,
  longPressKeyParamSchema,
  longPressParamSchema,
  multiSwipeParamSchema,
  scrollParamSchema,
  shellParamSchema,
  stopTaskParamSchema,
  swipeParamSchema,
  touchParamSchema,
  touchUpParamSchema,
  type ActionType,
} from "./schema/action";
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
  templateMatchParamSchema,
  type RecognitionType,
} from "./schema/recognition";

const recognitionParamSchemas: Record<RecognitionType, z.AnyZodObject> = {
  DirectHit: directHitParamSchema,
  TemplateMatch: templateMatchParamSchema,
  FeatureMatch: featureMatchParamSchema,
  ColorMatch: colorMatchParamSchema,
  OCR: ocrParamSchema,
  NeuralNetworkClassify: neuralNetworkClassifyParamSchema,
  NeuralNetworkDetect: neuralNetworkDetectParamSchema,
  And: andParamSchema,
  Or: orParamSchema,
  Custom: customRecognitionParamSchema,
};

const actionParamSchemas: Record<ActionType, z.AnyZodObject> = {
  DoNothing: doNothingParamSchema,
  Click: clickParamSchema,
  LongPress: longPressParamSchema,
  Swipe: swipeParamSchema,
  MultiSwipe: multiSwipeParamSchema,
  TouchDown: touchParamSchema,
  TouchMove: touchParamSchema,
  TouchUp: touchUpParamSchema,
  ClickKey: clickKeyParamSchema,
  LongPressKey: longPressKeyParamSchema,
  KeyDown: keyParamSchema,
  KeyUp: keyParamSchema,
  InputText: inputTextParamSchema,
  StartApp: appParamSchema,
  StopApp: appParamSchema,
  StopTask: stopTaskParamSchema,
  Scroll: scrollParamSchema,
  Command: commandParamSchema,
  Shell: shellParamSchema,
  Custom: customActionParamSchema,
};

// Required fields have no default and are left out.
function fieldDefaults(schema: z.AnyZodObject): Record<string, unknown> {
  const defaults: Record<string, unknown> = {};
  for (const [key, field] of Object.entries<z.ZodTypeAny>(schema.shape)) {
    const parsed = field.safeParse(undefined);
    if (parsed.success) {
      defaults[key] = parsed.data;
    }
  }
  return defaults;
}

/** Default parameters of a recognition type in wire form, or `null` for an unknown type. */
export function defaultRecognitionParam(type: string): Record<string, unknown> | null {
  return isRecognitionType(type) ? fieldDefaults(recognitionParamSchemas[type]) : null;
}

/** Default parameters of an action type in wire form, or `null` for an unknown type. */
export function defaultActionParam(type: string): Record<string, unknown> | null {
  return isActionType(type) ? fieldDefaults(actionParamSchemas[type]) : null;
}

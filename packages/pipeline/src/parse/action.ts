import {
  appParamSchema,
  clickKeyParamSchema,
  clickParamSchema,
  commandParamSchema,
  customActionParamSchema,
  doNothingParamSchema,
  inputTextParamSchema,
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
  isActionType,
  type Action,
  type ActionType,
} from "../schema/action";
import { serializeAction } from "../serialize";
import { parseWith, type FieldPath } from "../validate";
import { readVariantPayload, type VariantPayload } from "./variant";

export function buildAction(type: ActionType, raw: Record<string, unknown>, path: FieldPath): Action {
  switch (type) {
    case "DoNothing":
      return { type, param: parseWith(doNothingParamSchema, raw, path) };
    case "Click":
      return { type, param: parseWith(clickParamSchema, raw, path) };
    case "LongPress":
      return { type, param: parseWith(longPressParamSchema, raw, path) };
    case "Swipe":
      return { type, param: parseWith(swipeParamSchema, raw, path) };
    case "MultiSwipe":
      return { type, param: parseWith(multiSwipeParamSchema, raw, path) };
    case "TouchDown":
      return { type, param: parseWith(touchParamSchema, raw, path) };
    case "TouchMove":
      return { type, param: parseWith(touchParamSchema, raw, path) };
    case "TouchUp":
      return { type, param: parseWith(touchUpParamSchema, raw, path) };
    case "ClickKey":
      return { type, param: parseWith(clickKeyParamSchema, raw, path) };
    case "LongPressKey":
      return { type, param: parseWith(longPressKeyParamSchema, raw, path) };
    case "KeyDown":
      return { type, param: parseWith(keyParamSchema, raw, path) };
    case "KeyUp":
      return { type, param: parseWith(keyParamSchema, raw, path) };
    case "InputText":
      return { type, param: parseWith(inputTextParamSchema, raw, path) };
    case "StartApp":
      return { type, param: parseWith(appParamSchema, raw, path) };
    case "StopApp":
      return { type, param: parseWith(appParamSchema, raw, path) };
    case "StopTask":
      return { type, param: parseWith(stopTaskParamSchema, raw, path) };
    case "Scroll":
      return { type, param: parseWith(scrollParamSchema, raw, path) };
    case "Command":
      return { type, param: parseWith(commandParamSchema, raw, path) };
    case "Shell":
      return { type, param: parseWith(shellParamSchema, raw, path) };
    case "Custom":
      return { type, param: parseWith(customActionParamSchema, raw, path) };
  }
}

export function mergeAction(
  previous: Action | undefined,
  payload: VariantPayload<ActionType>,
  path: FieldPath,
): Action {
  const inherited = previous && previous.type === payload.type ? serializeAction(previous).param : {};
  return buildAction(payload.type, { ...inherited, ...payload.param }, [...path, "param"]);
}

export function parseAction(value: unknown, path: FieldPath = []): Action {
  return mergeAction(undefined, readVariantPayload(value, "DoNothing", isActionType, path, "action"), path);
}

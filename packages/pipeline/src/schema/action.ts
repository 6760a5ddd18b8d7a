import { z } from "zod";
import { intSchema, jsonValueSchema, rectSchema, scalarOrList, targetSchema, zeroRect } from "./common";

export const doNothingParamSchema = z.object({}).strict();

export const clickParamSchema = z
  .object({
    target: targetSchema.default(true),
    target_offset: rectSchema.default(zeroRect),
    contact: intSchema.default(0),
    pressure: intSchema.default(1),
  })
  .strict();

export const longPressParamSchema = z
  .object({
    target: targetSchema.default(true),
    target_offset: rectSchema.default(zeroRect),
    duration: intSchema.min(0).default(1000),
    contact: intSchema.default(0),
    pressure: intSchema.default(1),
  })
  .strict();

export const swipeParamSchema = z
  .object({
    starting: intSchema.min(0).default(0),
    begin: targetSchema.default(true),
    begin_offset: rectSchema.default(zeroRect),
    end: scalarOrList(targetSchema).default(() => [true]),
    end_offset: scalarOrList(rectSchema).default(() => [zeroRect()]),
    end_hold: scalarOrList(intSchema.min(0)).default(() => [0]),
    duration: scalarOrList(intSchema.min(0)).default(() => [200]),
    only_hover: z.boolean().default(false),
    contact: intSchema.default(0),
    pressure: intSchema.default(1),
  })
  .strict();

export const multiSwipeParamSchema = z
  .object({
    swipes: z.array(swipeParamSchema).default(() => []),
  })
  .strict();

export const touchParamSchema = z
  .object({
    contact: intSchema.default(0),
    target: targetSchema.default(true),
    target_offset: rectSchema.default(zeroRect),
    pressure: intSchema.default(0),
  })
  .strict();

export const touchUpParamSchema = z
  .object({
    contact: intSchema.default(0),
  })
  .strict();

export const clickKeyParamSchema = z
  .object({
    key: scalarOrList(intSchema),
  })
  .strict();

export const longPressKeyParamSchema = z
  .object({
    key: scalarOrList(intSchema),
    duration: intSchema.min(0).default(1000),
  })
  .strict();

export const keyParamSchema = z
  .object({
    key: intSchema,
  })
  .strict();

export const inputTextParamSchema = z
  .object({
    input_text: z.string(),
  })
  .strict();

export const appParamSchema = z
  .object({
    package: z.string(),
  })
  .strict();

export const stopTaskParamSchema = z.object({}).strict();

export const scrollParamSchema = z
  .object({
    target: targetSchema.default(true),
    target_offset: rectSchema.default(zeroRect),
    dx: intSchema.default(0),
    dy: intSchema.default(0),
  })
  .strict();

export const commandParamSchema = z
  .object({
    exec: z.string(),
    args: z.array(z.string()).default(() => []),
    detach: z.boolean().default(false),
  })
  .strict();

export const shellParamSchema = z
  .object({
    cmd: z.string(),
    timeout: intSchema.min(0).default(20_000),
  })
  .strict();

export const customActionParamSchema = z
  .object({
    custom_action: z.string(),
    target: targetSchema.default(true),
    custom_action_param: jsonValueSchema.default(null),
    target_offset: rectSchema.default(zeroRect),
  })
  .strict();

export type DoNothing = z.output<typeof doNothingParamSchema>;
export type Click = z.output<typeof clickParamSchema>;
export type LongPress = z.output<typeof longPressParamSchema>;
export type Swipe = z.output<typeof swipeParamSchema>;
export type MultiSwipe = z.output<typeof multiSwipeParamSchema>;
export type Touch = z.output<typeof touchParamSchema>;
export type TouchUp = z.output<typeof touchUpParamSchema>;
export type ClickKey = z.output<typeof clickKeyParamSchema>;
export type LongPressKey = z.output<typeof longPressKeyParamSchema>;
export type Key = z.output<typeof keyParamSchema>;
export type InputText = z.output<typeof inputTextParamSchema>;
export type App = z.output<typeof appParamSchema>;
export type StopTask = z.output<typeof stopTaskParamSchema>;
export type Scroll = z.output<typeof scrollParamSchema>;
export type Command = z.output<typeof commandParamSchema>;
export type Shell = z.output<typeof shellParamSchema>;
export type CustomAction = z.output<typeof customActionParamSchema>;

export type Action =
  | { type: "DoNothing"; param: DoNothing }
  | { type: "Click"; param: Click }
  | { type: "LongPress"; param: LongPress }
  | { type: "Swipe"; param: Swipe }
  | { type: "MultiSwipe"; param: MultiSwipe }
  | { type: "TouchDown"; param: Touch }
  | { type: "TouchMove"; param: Touch }
  | { type: "TouchUp"; param: TouchUp }
  | { type: "ClickKey"; param: ClickKey }
  | { type: "LongPressKey"; param: LongPressKey }
  | { type: "KeyDown"; param: Key }
  | { type: "KeyUp"; param: Key }
  | { type: "InputText"; param: InputText }
  | { type: "StartApp"; param: App }
  | { type: "StopApp"; param: App }
  | { type: "StopTask"; param: StopTask }
  | { type: "Scroll"; param: Scroll }
  | { type: "Command"; param: Command }
  | { type: "Shell"; param: Shell }
  | { type: "Custom"; param: CustomAction };

export type ActionType = Action["type"];

export const ACTION_TYPES: readonly ActionType[] = [
  "DoNothing",
  "Click",
  "LongPress",
  "Swipe",
  "MultiSwipe",
  "TouchDown",
  "TouchMove",
  "TouchUp",
  "ClickKey",
  "LongPressKey",
  "KeyDown",
  "KeyUp",
  "InputText",
  "StartApp",
  "StopApp",
  "StopTask",
  "Scroll",
  "Command",
  "Shell",
  "Custom",
];

export function isActionType(value: string): value is ActionType {
  return ACTION_TYPES.some((type) => type === value);
}

export const actionParamKeys: Record<ActionType, readonly string[]> = {
  DoNothing: Object.keys(doNothingParamSchema.shape),
  Click: Object.keys(clickParamSchema.shape),
  LongPress: Object.keys(longPressParamSchema.shape),
  Swipe: Object.keys(swipeParamSchema.shape),
  MultiSwipe: Object.keys(multiSwipeParamSchema.shape),
  TouchDown: Object.keys(touchParamSchema.shape),
  TouchMove: Object.keys(touchParamSchema.shape),
  TouchUp: Object.keys(touchUpParamSchema.shape),
  ClickKey: Object.keys(clickKeyParamSchema.shape),
  LongPressKey: Object.keys(longPressKeyParamSchema.shape),
  KeyDown: Object.keys(keyParamSchema.shape),
  KeyUp: Object.keys(keyParamSchema.shape),
  InputText: Object.keys(inputTextParamSchema.shape),
  StartApp: Object.keys(appParamSchema.shape),
  StopApp: Object.keys(appParamSchema.shape),
  StopTask: Object.keys(stopTaskParamSchema.shape),
  Scroll: Object.keys(scrollParamSchema.shape),
  Command: Object.keys(commandParamSchema.shape),
  Shell: Object.keys(shellParamSchema.shape),
  Custom: Object.keys(customActionParamSchema.shape),
};

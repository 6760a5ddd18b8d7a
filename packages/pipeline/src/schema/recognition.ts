import { z } from "zod";
import { intSchema, jsonValueSchema, roiFields, scalarOrList } from "./common";

export const directHitParamSchema = z.object({ ...roiFields }).strict();

export const templateMatchParamSchema = z
  .object({
    template: scalarOrList(z.string()),
    ...roiFields,
    threshold: scalarOrList(z.number()).default(() => [0.7]),
    order_by: z.string().default("Horizontal"),
    index: intSchema.default(0),
    method: intSchema.default(5),
    green_mask: z.boolean().default(false),
  })
  .strict();

export const featureMatchParamSchema = z
  .object({
    template: scalarOrList(z.string()),
    ...roiFields,
    detector: z.string().default("SIFT"),
    order_by: z.string().default("Horizontal"),
    count: intSchema.default(4),
    index: intSchema.default(0),
    green_mask: z.boolean().default(false),
    ratio: z.number().default(0.6),
  })
  .strict();

export const colorMatchParamSchema = z
  .object({
    lower: scalarOrList(z.array(intSchema)),
    upper: scalarOrList(z.array(intSchema)),
    ...roiFields,
    order_by: z.string().default("Horizontal"),
    method: intSchema.default(4),
    count: intSchema.default(1),
    index: intSchema.default(0),
    connected: z.boolean().default(false),
  })
  .strict();

export const ocrParamSchema = z
  .object({
    expected: scalarOrList(z.string()).default(() => []),
    ...roiFields,
    threshold: z.number().default(0.3),
    replace: z.array(z.tuple([z.string(), z.string()])).default(() => []),
    order_by: z.string().default("Horizontal"),
    index: intSchema.default(0),
    only_rec: z.boolean().default(false),
    model: z.string().default(""),
  })
  .strict();

export const neuralNetworkClassifyParamSchema = z
  .object({
    model: z.string(),
    expected: scalarOrList(intSchema).default(() => []),
    ...roiFields,
    labels: z.array(z.string()).default(() => []),
    order_by: z.string().default("Horizontal"),
    index: intSchema.default(0),
  })
  .strict();

export const neuralNetworkDetectParamSchema = z
  .object({
    model: z.string(),
    expected: scalarOrList(intSchema).default(() => []),
    ...roiFields,
    threshold: scalarOrList(z.number()).default(() => [0.3]),
    labels: z.array(z.string()).default(() => []),
    order_by: z.string().default("Horizontal"),
    index: intSchema.default(0),
  })
  .strict();

export const customRecognitionParamSchema = z
  .object({
    custom_recognition: z.string(),
    ...roiFields,
    custom_recognition_param: jsonValueSchema.default(null),
  })
  .strict();

// Composite members are converted separately since they may nest further composites.
export const andParamSchema = z
  .object({
    all_of: z.array(z.unknown()).default(() => []),
    box_index: intSchema.min(0).default(0),
  })
  .strict();

export const orParamSchema = z
  .object({
    any_of: z.array(z.unknown()).default(() => []),
  })
  .strict();

export type DirectHit = z.output<typeof directHitParamSchema>;
export type TemplateMatch = z.output<typeof templateMatchParamSchema>;
export type FeatureMatch = z.output<typeof featureMatchParamSchema>;
export type ColorMatch = z.output<typeof colorMatchParamSchema>;
export type OCR = z.output<typeof ocrParamSchema>;
export type NeuralNetworkClassify = z.output<typeof neuralNetworkClassifyParamSchema>;
export type NeuralNetworkDetect = z.output<typeof neuralNetworkDetectParamSchema>;
export type CustomRecognition = z.output<typeof customRecognitionParamSchema>;

/** A named node reference, or an inline recognition. */
export type RecognitionRef = string | Recognition;

export type And = {
  all_of: RecognitionRef[];
  /** Which member's box becomes the composite's box. */
  box_index: number;
};

export type Or = {
  any_of: RecognitionRef[];
};

export type Recognition =
  | { type: "DirectHit"; param: DirectHit }
  | { type: "TemplateMatch"; param: TemplateMatch }
  | { type: "FeatureMatch"; param: FeatureMatch }
  | { type: "ColorMatch"; param: ColorMatch }
  | { type: "OCR"; param: OCR }
  | { type: "NeuralNetworkClassify"; param: NeuralNetworkClassify }
  | { type: "NeuralNetworkDetect"; param: NeuralNetworkDetect }
  | { type: "And"; param: And }
  | { type: "Or"; param: Or }
  | { type: "Custom"; param: CustomRecognition };

export type RecognitionType = Recognition["type"];

export const RECOGNITION_TYPES: readonly RecognitionType[] = [
  "DirectHit",
  "TemplateMatch",
  "FeatureMatch",
  "ColorMatch",
  "OCR",
  "NeuralNetworkClassify",
  "NeuralNetworkDetect",
  "And",
  "Or",
  "Custom",
];

export function isRecognitionType(value: string): value is RecognitionType {
  return RECOGNITION_TYPES.some((type) => type === value);
}

/** Parameter keys each variant declares; used to route keys written at node level. */
export const recognitionParamKeys: Record<RecognitionType, readonly string[]> = {
  DirectHit: Object.keys(directHitParamSchema.shape),
  TemplateMatch: Object.keys(templateMatchParamSchema.shape),
  FeatureMatch: Object.keys(featureMatchParamSchema.shape),
  ColorMatch: Object.keys(colorMatchParamSchema.shape),
  OCR: Object.keys(ocrParamSchema.shape),
  NeuralNetworkClassify: Object.keys(neuralNetworkClassifyParamSchema.shape),
  NeuralNetworkDetect: Object.keys(neuralNetworkDetectParamSchema.shape),
  And: Object.keys(andParamSchema.shape),
  Or: Object.keys(orParamSchema.shape),
  Custom: Object.keys(customRecognitionParamSchema.shape),
};

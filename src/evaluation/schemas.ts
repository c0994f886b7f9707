import { z } from 'zod';

export const FieldSpecSchema = z.discriminatedUnion('kind', [
  z.object({
    name: z.string().min(1),
    kind: z.literal('ExactNormalizedText'),
  }),
  z.object({
    name: z.string().min(1),
    kind: z.literal('FormulaMatch'),
  }),
  z.object({
    name: z.string().min(1),
    kind: z.literal('NumericSetWithTolerance'),
    tolerance: z.number().nonnegative().optional(),
  }),
  z.object({
    name: z.string().min(1),
    kind: z.literal('KeyedNumericSeries'),
    precision: z.number().int().min(0).max(10).optional(),
  }),
  z.object({
    name: z.string().min(1),
    kind: z.literal('SetOfStrings'),
    delimiter: z.string().min(1).optional(),
  }),
]);

// Checked first so an unrecognised kind surfaces as its own error.
export const RawFieldSpecSchema = z
  .object({
    name: z.string().min(1),
    kind: z.string(),
  })
  .passthrough();

export const FieldRegistrySchema = z.object({
  fields: z.array(RawFieldSpecSchema),
});

export const FieldValueSchema = z.union([
  z.string(),
  z.number(),
  z.array(z.union([z.string(), z.number()])),
  z.null(),
]);

export type FieldValue = z.infer<typeof FieldValueSchema>;

export const EvaluationDocumentSchema = z.object({
  records: z
    .array(
      z.object({
        anchor: z.string().nullable().optional(),
        fields: z.record(z.string(), FieldValueSchema.optional()).default({}),
      })
    )
    .default([]),
  sequences: z
    .array(
      z.object({
        anchor: z.string().nullable().optional(),
        steps: z.array(z.string()),
      })
    )
    .default([]),
});

import { z } from 'zod';

export const FieldValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
  z.array(z.string()),
]);

export const SourceRecordSchema = z.record(z.string(), FieldValueSchema);

export const SourcePayloadSchema = z.object({
  records: z.array(SourceRecordSchema),
  sourceUrl: z.string().optional(),
});

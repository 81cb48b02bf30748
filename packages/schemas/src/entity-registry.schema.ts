import { z } from 'zod';

export const EntityKindSchema = z.enum([
  'person',
  'organization',
  'country',
  'vessel',
  'aircraft',
  'other',
]);

export const KnownEntitySchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  names: z.array(z.string().min(1)).min(1),
  kind: EntityKindSchema,
  canonicalId: z.string().min(1).optional(),
});

export const EntityRegistrySchema = z
  .object({
    entities: z.array(KnownEntitySchema),
  })
  .superRefine((registry, ctx) => {
    const seen = new Set<string>();
    registry.entities.forEach((entity, index) => {
      if (seen.has(entity.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['entities', index, 'id'],
          message: `Duplicate entity id "${entity.id}"`,
        });
      }
      seen.add(entity.id);
    });
  });

export type EntityRegistry = z.infer<typeof EntityRegistrySchema>;

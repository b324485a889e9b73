import { z } from 'zod';

const emptyToUndef = (v: unknown) => (v === '' ? undefined : v);

export const listQuerySchema = z.object({
  limit: z.preprocess(emptyToUndef, z.coerce.number().int().min(1).optional()),
});

export type ListQuery = z.infer<typeof listQuerySchema>;

export const validateListQuery = (q: unknown): ListQuery => listQuerySchema.parse(q);

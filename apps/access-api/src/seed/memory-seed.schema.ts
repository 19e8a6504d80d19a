import { z } from 'zod';
import { RestMethod } from '../rights/rest-method.enum';

const id = z.string().min(1).max(64);

export const memorySeedSchema = z.object({
  groups: z.array(z.object({ id, name: z.string().min(1).max(64) })).default([]),
  users: z
    .array(z.object({ id, pseudo: z.string().min(1).max(64), groupIds: z.array(id).default([]) }))
    .default([]),
  rights: z
    .array(
      z
        .object({
          id,
          groupId: id.optional(),
          userId: id.optional(),
          resource: z.string().min(1).max(64),
          instanceId: id.optional(),
          method: z.nativeEnum(RestMethod)
        })
        .refine((r) => (r.groupId === undefined) !== (r.userId === undefined), {
          message: 'exactly one of groupId or userId is required'
        })
    )
    .default([])
});

export type MemorySeed = z.infer<typeof memorySeedSchema>;
export type SeedRight = MemorySeed['rights'][number];

import { z } from 'zod';

export const memberInfoSchema = z.object({
  username: z.string().optional(),
  firstName: z.string().optional(),
  lastName: z.string().optional(),
});

export const profileAnswersSchema = z.object({
  field: z.string(),
  seeking: z.string(),
  offering: z.string(),
});

/** Vector payloads read back from a snapshot file */
export const profileSnapshotSchema = z.object({
  userId: z.number().int(),
  answers: profileAnswersSchema,
  keywords: z.array(z.string()),
  member: memberInfoSchema,
  updatedAt: z.number(),
});

import { z } from 'zod';

// ========== Team directory entry ==========
export const teamEntrySchema = z.object({
  code: z
    .string()
    .regex(/^[A-Z]{2,3}$/, 'Team code must be 2-3 uppercase letters'),
  name: z.string().min(1),
  aliases: z.array(z.string().min(1)).default([]),
});

export type TeamEntry = z.infer<typeof teamEntrySchema>;

// ========== Full directory ==========
export const teamDirectorySchema = z
  .array(teamEntrySchema)
  .min(1)
  .refine((teams) => new Set(teams.map((t) => t.code)).size === teams.length, {
    message: 'Team codes must be unique',
  });

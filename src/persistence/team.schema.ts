import { z } from 'zod';

import { charLength, OPTION_VALUE_MAX_LENGTH } from '../block-kit';

export const teamSchema = z.object({
  /** Unique team name, also its document id and the value of its option in the team picker */
  name: z
    .string()
    .min(1)
    .refine((name) => charLength(name) <= OPTION_VALUE_MAX_LENGTH, {
      message: `Team name must be at most ${OPTION_VALUE_MAX_LENGTH} characters`,
    }),

  /** Channel id the team's daily report is posted to */
  dailyChannel: z.string().min(1),
});

export type Team = z.infer<typeof teamSchema>;

export function validateTeam(data: unknown, id?: string): Team {
  const result = teamSchema.safeParse(data);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    const source = id ? ` for ${id}` : '';
    throw new Error(`Invalid team${source}:\n${errors}`);
  }

  return result.data;
}

import { z } from 'zod';

/**
 * Where the user's Jira instance is hosted.
 */
export const JIRA_HOST_TYPES = ['Cloud', 'Local'] as const;
export type JiraHostType = (typeof JIRA_HOST_TYPES)[number];

export const chatUserDataSchema = z.object({
  teamId: z.string(),
  teamDomain: z.string(),
  /** Chat user id, also the user's document id */
  userId: z.string().min(1),
  userName: z.string(),
});

export type ChatUserData = z.infer<typeof chatUserDataSchema>;

export const userSchema = z.object({
  /** Name of the team the user reports to */
  team: z.string().min(1),

  jiraServerUrl: z.string().url(),
  jiraApiToken: z.string().min(1),
  jiraEmail: z.string().email(),
  jiraHostType: z.enum(JIRA_HOST_TYPES).default('Cloud'),

  /** Project keys whose issues appear in the daily form */
  jiraKeys: z.array(z.string()).default([]),

  chatData: chatUserDataSchema,
});

export type User = z.infer<typeof userSchema>;

export function validateUser(data: unknown, id?: string): User {
  const result = userSchema.safeParse(data);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    const source = id ? ` for ${id}` : '';
    throw new Error(`Invalid user${source}:\n${errors}`);
  }

  return result.data;
}

import { z } from 'zod';

/**
 * One issue's entry in a user's daily report.
 */
export const dailyIssueReportSchema = z.object({
  /** Issue key (e.g., "CORE-12") */
  key: z.string().min(1),

  /** Status chosen in the daily form */
  status: z.string().optional(),

  /** Free-text progress details */
  details: z.string().optional(),

  /** Permalink to the issue in the tracker */
  link: z.string().optional(),

  /** Issue summary at the time of reporting */
  summary: z.string().optional(),
});

export type DailyIssueReport = z.infer<typeof dailyIssueReportSchema>;

export const dailyReportSchema = z.object({
  issueReports: z.array(dailyIssueReportSchema).default([]),

  /** Other comments / blockers */
  generalComments: z.string().optional(),
});

export type DailyReport = z.infer<typeof dailyReportSchema>;

/**
 * Schema for a team's daily: every member's report for one date.
 */
export const dailySchema = z.object({
  team: z.string().min(1),

  /** ISO date string: YYYY-MM-DD */
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),

  /** Reports keyed by chat user id */
  reports: z.record(dailyReportSchema).default({}),
});

export type Daily = z.infer<typeof dailySchema>;

/**
 * Document id of a team's daily for a date.
 */
export function dailyId(date: string, team: string): string {
  return `${date}|${team}`;
}

export function createEmptyDaily(team: string, date: string): Daily {
  return { team, date, reports: {} };
}

export function validateDaily(data: unknown, id?: string): Daily {
  const result = dailySchema.safeParse(data);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    const source = id ? ` for ${id}` : '';
    throw new Error(`Invalid daily${source}:\n${errors}`);
  }

  return result.data;
}

import { z } from 'zod';

import { TrackerIssue } from '../../issue-tracker/interfaces';
import { DailyIssueReport, DailyReport } from '../../persistence/daily.schema';
import { User, userSchema } from '../../persistence/user.schema';
import { ACTION_IDS, IGNORE_ISSUE_VALUE, issueBlockId } from '../daily.constants';
import { DailyModalMetadata } from '../views';

/**
 * Thrown when an interaction payload lacks what the handler needs,
 * typically a required form field the user left empty.
 */
export class InteractionParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InteractionParseError';
  }
}

const selectedOptionSchema = z.object({ value: z.string() });

/**
 * State of one interactive element as the platform reports it.
 */
const elementStateSchema = z.object({
  type: z.string(),
  value: z.string().nullish(),
  selected_option: selectedOptionSchema.nullish(),
  selected_options: z.array(selectedOptionSchema).nullish(),
});

type ElementState = z.infer<typeof elementStateSchema>;

/** `state.values[blockId][actionId]` */
const stateValuesSchema = z.record(z.record(elementStateSchema));

export type StateValues = z.infer<typeof stateValuesSchema>;

const viewPayloadSchema = z.object({
  view: z.object({
    callback_id: z.string().optional(),
    private_metadata: z.string().optional(),
    state: z.object({ values: stateValuesSchema }),
  }),
});

const interactionActorSchema = z.object({
  user: z.object({ id: z.string(), name: z.string().default('') }),
  team: z.object({ id: z.string(), domain: z.string().default('') }),
});

const blockActionSchema = z.object({
  actions: z.array(
    z.object({
      action_id: z.string(),
      selected_options: z.array(selectedOptionSchema).optional(),
    }),
  ),
});

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, what: string): T {
  const result = schema.safeParse(data);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new InteractionParseError(`Invalid ${what}:\n${errors}`);
  }

  return result.data;
}

function elementState(values: StateValues, blockId: string, actionId: string): ElementState | undefined {
  return values[blockId]?.[actionId];
}

/** Trimmed text input value, or undefined when left empty */
function textValue(values: StateValues, blockId: string, actionId: string): string | undefined {
  const value = elementState(values, blockId, actionId)?.value?.trim();
  return value ? value : undefined;
}

function requiredText(values: StateValues, blockId: string, actionId: string): string {
  const value = textValue(values, blockId, actionId);
  if (value === undefined) {
    throw new InteractionParseError(`Missing value for ${blockId}`);
  }
  return value;
}

function selectedValue(values: StateValues, blockId: string, actionId: string): string | undefined {
  return elementState(values, blockId, actionId)?.selected_option?.value;
}

function selectedValues(values: StateValues, blockId: string, actionId: string): string[] {
  return (elementState(values, blockId, actionId)?.selected_options ?? []).map((o) => o.value);
}

export function parseViewState(payload: unknown): StateValues {
  return parseOrThrow(viewPayloadSchema, payload, 'view payload').view.state.values;
}

/**
 * Read the metadata the daily modal was opened with.
 */
export function parseDailyModalMetadata(payload: unknown): DailyModalMetadata | null {
  const raw = parseOrThrow(viewPayloadSchema, payload, 'view payload').view.private_metadata;
  if (!raw) {
    return null;
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    throw new InteractionParseError('Invalid daily modal metadata: not JSON');
  }

  return parseOrThrow(
    z.object({ date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/) }),
    data,
    'daily modal metadata',
  );
}

/**
 * Build a user from the home tab configuration form.
 * Project keys are left empty; they are chosen in the next step.
 */
export function parseUserConfiguration(payload: unknown): User {
  const values = parseViewState(payload);
  const actor = parseOrThrow(interactionActorSchema, payload, 'interaction actor');
  const team = selectedValue(values, ACTION_IDS.SELECT_USER_TEAM, ACTION_IDS.SELECT_USER_TEAM);

  if (!team) {
    throw new InteractionParseError('No team selected');
  }

  return parseOrThrow(
    userSchema,
    {
      team,
      jiraServerUrl: requiredText(values, ACTION_IDS.JIRA_SERVER, ACTION_IDS.JIRA_SERVER),
      jiraApiToken: requiredText(values, ACTION_IDS.JIRA_API_TOKEN, ACTION_IDS.JIRA_API_TOKEN),
      jiraEmail: requiredText(values, ACTION_IDS.JIRA_EMAIL, ACTION_IDS.JIRA_EMAIL),
      jiraHostType: selectedValue(values, ACTION_IDS.JIRA_HOST_TYPE, ACTION_IDS.JIRA_HOST_TYPE),
      jiraKeys: [],
      chatData: {
        teamId: actor.team.id,
        teamDomain: actor.team.domain,
        userId: actor.user.id,
        userName: actor.user.name,
      },
    },
    'user configuration',
  );
}

/**
 * Split a typed key list such as "EDGE,ULT" into upper-cased, de-duplicated keys.
 */
export function splitJiraKeys(text: string): string[] {
  const keys = text
    .split(',')
    .map((key) => key.trim().toUpperCase())
    .filter((key) => key.length > 0);
  return [...new Set(keys)];
}

/**
 * Project keys from the board picker: the multi select's action, or the typed list.
 */
export function parseJiraKeys(payload: unknown, actionId: string): string[] {
  if (actionId === ACTION_IDS.SELECT_USER_BOARD) {
    const { actions } = parseOrThrow(blockActionSchema, payload, 'block action');
    const action = actions.find((a) => a.action_id === ACTION_IDS.SELECT_USER_BOARD);
    return (action?.selected_options ?? []).map((o) => o.value);
  }

  const values = parseViewState(payload);
  return splitJiraKeys(
    requiredText(values, ACTION_IDS.TYPE_OR_SELECT_USER_BOARD, ACTION_IDS.TYPE_USER_BOARD),
  );
}

/**
 * Turn the submitted daily form into a report.
 *
 * Ignored issues are dropped; an issue whose status was not touched keeps the tracker's
 * status, and summary and link come from the tracker.
 */
export function parseDailySubmission(values: StateValues, issues: TrackerIssue[]): DailyReport {
  const issueReports: DailyIssueReport[] = [];

  for (const issue of issues) {
    const actionsBlockId = issueBlockId(issue.key, ACTION_IDS.ISSUE_ACTIONS);
    if (values[actionsBlockId] === undefined) {
      continue;
    }

    const ignored = selectedValues(values, actionsBlockId, ACTION_IDS.IGNORE_ISSUE);
    if (ignored.includes(IGNORE_ISSUE_VALUE)) {
      continue;
    }

    issueReports.push({
      key: issue.key,
      status: selectedValue(values, actionsBlockId, ACTION_IDS.SELECT_STATUS) ?? issue.status,
      details: textValue(
        values,
        issueBlockId(issue.key, ACTION_IDS.ISSUE_SUMMARY),
        ACTION_IDS.ISSUE_SUMMARY,
      ),
      link: issue.permalink,
      summary: issue.summary,
    });
  }

  return {
    issueReports,
    generalComments: textValue(values, ACTION_IDS.GENERAL_COMMENTS, ACTION_IDS.GENERAL_COMMENTS),
  };
}

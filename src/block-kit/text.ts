import { BlockKitError, checkStringLength } from './block-kit.errors';

/**
 * Text display kinds, keyed by symbolic name with their wire token as value.
 */
export const TextType = {
  Plain: 'plain_text',
  Markdown: 'mrkdwn',
} as const;

export type TextType = (typeof TextType)[keyof typeof TextType];

/**
 * What to do with text longer than its limit: fail, or shorten with an ellipsis.
 */
export type LengthPolicy = 'reject' | 'truncate';

export const ELLIPSIS = '...';

/** Default limit for free text, the largest the platform accepts in a text object. */
export const DEFAULT_TEXT_MAX_LENGTH = 3000;

export interface BoundedText {
  readonly type: TextType;
  readonly text: string;
  readonly maxLength: number;
  /** Escape emoji into colon format (plain_text only) */
  readonly emoji?: boolean;
  /** Skip auto-linking and mention parsing (mrkdwn only) */
  readonly verbatim?: boolean;
}

export interface TextFlags {
  emoji?: boolean;
  verbatim?: boolean;
  /** Path reported in errors */
  field?: string;
}

/**
 * Shorten `value` to `limit` characters, replacing the tail with an ellipsis.
 * Values within the limit are returned unchanged.
 */
export function truncateText(value: string, limit: number): string {
  const chars = Array.from(value);
  if (chars.length <= limit) {
    return value;
  }
  if (limit <= ELLIPSIS.length) {
    return chars.slice(0, limit).join('');
  }
  return chars.slice(0, limit - ELLIPSIS.length).join('') + ELLIPSIS;
}

/**
 * Build a text object bounded to `maxLength` characters.
 *
 * Under the `reject` policy over-long text fails with LengthExceeded; under `truncate`
 * it is cut to exactly `maxLength` characters ending in "...".
 */
export function boundedText(
  kind: TextType,
  text: string,
  maxLength: number,
  policy: LengthPolicy = 'reject',
  restrictKind?: TextType,
  flags: TextFlags = {},
): BoundedText {
  const field = flags.field ?? 'text';

  if (restrictKind !== undefined && kind !== restrictKind) {
    throw new BlockKitError('KindMismatch', field, `must be ${restrictKind}, got ${kind}`);
  }
  if (flags.emoji !== undefined && kind !== TextType.Plain) {
    throw new BlockKitError(
      'KindMismatch',
      `${field}.emoji`,
      `emoji is only allowed on ${TextType.Plain}`,
    );
  }
  if (flags.verbatim !== undefined && kind !== TextType.Markdown) {
    throw new BlockKitError(
      'KindMismatch',
      `${field}.verbatim`,
      `verbatim is only allowed on ${TextType.Markdown}`,
    );
  }

  let value = text;
  if (policy === 'truncate') {
    value = truncateText(text, maxLength);
  } else {
    checkStringLength(field, text, maxLength);
  }

  return Object.freeze<BoundedText>({
    type: kind,
    text: value,
    maxLength,
    emoji: flags.emoji,
    verbatim: flags.verbatim,
  });
}

export interface PlainTextOptions {
  emoji?: boolean;
  maxLength?: number;
  policy?: LengthPolicy;
}

export function plainText(text: string, options: PlainTextOptions = {}): BoundedText {
  return boundedText(
    TextType.Plain,
    text,
    options.maxLength ?? DEFAULT_TEXT_MAX_LENGTH,
    options.policy,
    undefined,
    { emoji: options.emoji },
  );
}

export interface MarkdownTextOptions {
  verbatim?: boolean;
  maxLength?: number;
  policy?: LengthPolicy;
}

export function markdownText(text: string, options: MarkdownTextOptions = {}): BoundedText {
  return boundedText(
    TextType.Markdown,
    text,
    options.maxLength ?? DEFAULT_TEXT_MAX_LENGTH,
    options.policy,
    undefined,
    { verbatim: options.verbatim },
  );
}

/**
 * Check a text object placed in a field with its own limit and, optionally, a required kind.
 * Returns a frozen copy to store on the containing node.
 */
export function checkTextField(
  field: string,
  text: BoundedText,
  maxLength: number,
  restrictKind?: TextType,
): BoundedText {
  checkStringLength(field, text.text, maxLength);
  if (text.type !== TextType.Plain && text.type !== TextType.Markdown) {
    throw new BlockKitError('KindMismatch', field, `unknown text type ${String(text.type)}`);
  }
  if (restrictKind !== undefined && text.type !== restrictKind) {
    throw new BlockKitError('KindMismatch', field, `must be ${restrictKind}, got ${text.type}`);
  }
  return boundedText(text.type, text.text, text.maxLength, 'reject', undefined, {
    emoji: text.emoji,
    verbatim: text.verbatim,
    field,
  });
}

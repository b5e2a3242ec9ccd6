/**
 * Constraint categories a block-kit node can violate during construction.
 */
export const BLOCK_KIT_ERROR_KINDS = [
  'LengthExceeded',
  'KindMismatch',
  'MutualExclusionViolation',
  'CardinalityViolation',
  'ReferenceIntegrityViolation',
  'MissingRequiredField',
] as const;

export type BlockKitErrorKind = (typeof BLOCK_KIT_ERROR_KINDS)[number];

/**
 * Thrown synchronously by every block-kit builder when a node violates its constraints.
 * A rejected node cannot be repaired; build a new one.
 */
export class BlockKitError extends Error {
  constructor(
    public readonly kind: BlockKitErrorKind,
    public readonly field: string,
    message: string,
  ) {
    super(`${kind} at ${field}: ${message}`);
    this.name = 'BlockKitError';
  }
}

export type BuildResult<T> = { ok: true; value: T } | { ok: false; error: BlockKitError };

/**
 * Run a builder and return its outcome as a value instead of throwing.
 * Errors other than BlockKitError are rethrown.
 */
export function safeBuild<T>(build: () => T): BuildResult<T> {
  try {
    return { ok: true, value: build() };
  } catch (error) {
    if (error instanceof BlockKitError) {
      return { ok: false, error };
    }
    throw error;
  }
}

/** Count of a list field; throws unless min <= length <= max. */
export function checkCardinality(field: string, items: readonly unknown[], min: number, max: number): void {
  if (items.length < min || items.length > max) {
    throw new BlockKitError(
      'CardinalityViolation',
      field,
      `expected between ${min} and ${max} entries, got ${items.length}`,
    );
  }
}

/**
 * Check a list field's size, validate every entry under `field[i]` and return the validated
 * entries as a frozen copy, so later changes to the caller's array cannot reach the node.
 */
export function validateList<T>(
  field: string,
  items: readonly T[],
  min: number,
  max: number,
  validate: (item: T, field: string) => T,
): readonly T[] {
  checkCardinality(field, items, min, max);
  return Object.freeze(items.map((item, i) => validate(item, `${field}[${i}]`)));
}

/** Character length in code points, matching how the platform counts. */
export function charLength(value: string): number {
  return Array.from(value).length;
}

export function checkStringLength(field: string, value: string, maxLength: number): void {
  const length = charLength(value);
  if (length > maxLength) {
    throw new BlockKitError(
      'LengthExceeded',
      field,
      `${length} characters exceeds the maximum of ${maxLength}`,
    );
  }
}

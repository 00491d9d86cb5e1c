/**
 * Classification errors
 *
 * Every failure names the offending field and the rule that rejected it.
 * Classification is deterministic, so callers fix the input and re-run.
 */

export type ClassificationErrorKind = 'input' | 'configuration' | 'ambiguity';

export type ClassificationRule =
  | 'malformed-input'
  | 'empty-input'
  | 'field-not-found'
  | 'unique-hint-missing'
  | 'no-primary-key';

export class ClassificationError extends Error {
  public readonly kind: ClassificationErrorKind;
  public readonly field: string | null;
  public readonly rule: ClassificationRule;

  constructor(kind: ClassificationErrorKind, rule: ClassificationRule, field: string | null, message: string) {
    super(message);
    this.name = 'ClassificationError';
    this.kind = kind;
    this.rule = rule;
    this.field = field;
  }
}

/**
 * Statistics are missing, malformed, or the input set is empty
 */
export class InputError extends ClassificationError {
  constructor(rule: 'malformed-input' | 'empty-input', field: string | null, message: string) {
    super('input', rule, field, message);
    this.name = 'InputError';
  }
}

/**
 * The caller's primary-key override or the dataset's unique-field hints
 * do not match the statistics
 */
export class ConfigurationError extends ClassificationError {
  constructor(rule: 'field-not-found' | 'unique-hint-missing', field: string, message: string) {
    super('configuration', rule, field, message);
    this.name = 'ConfigurationError';
  }
}

/**
 * No rule could determine a primary key
 */
export class AmbiguityError extends ClassificationError {
  constructor(message: string) {
    super('ambiguity', 'no-primary-key', null, message);
    this.name = 'AmbiguityError';
  }
}

/**
 * Error types for CFI parsing and taxonomy loading.
 *
 * Parse errors are returned inside a neverthrow `Result`, never thrown. Each one
 * records the offending character and its position so callers can report it.
 */

import { CATEGORY_INDEX, CFI_LENGTH, GROUP_INDEX, type AttributePosition } from '../constants.js';
import { formatCharacter } from '../utils/characters.js';

export type CfiErrorCode =
  | 'INVALID_LENGTH'
  | 'INVALID_CATEGORY'
  | 'INVALID_GROUP'
  | 'INVALID_ATTRIBUTE'
  | 'INVALID_TAXONOMY';

/**
 * Base class for every error raised by this package
 */
export abstract class CfiError extends Error {
  abstract readonly code: CfiErrorCode;
  readonly severity = 'error' as const;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      message: this.message,
      name: this.name,
      severity: this.severity,
    };
  }
}

/**
 * The input is not exactly CFI_LENGTH characters. Checked before any position.
 */
export class InvalidLengthError extends CfiError {
  override readonly code = 'INVALID_LENGTH';

  constructor(public readonly length: number) {
    super(`CFI code must be ${CFI_LENGTH} characters, got ${length}`);
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), length: this.length };
  }
}

/**
 * Base for errors tied to one character of the code
 */
export abstract class InvalidCharacterError extends CfiError {
  abstract readonly position: number;

  constructor(
    public readonly character: string,
    message: string
  ) {
    super(message);
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), character: this.character, position: this.position };
  }
}

export class InvalidCategoryError extends InvalidCharacterError {
  override readonly code = 'INVALID_CATEGORY';
  override readonly position = CATEGORY_INDEX;

  constructor(character: string) {
    super(character, `Invalid CFI category '${formatCharacter(character)}'`);
  }
}

export class InvalidGroupError extends InvalidCharacterError {
  override readonly code = 'INVALID_GROUP';
  override readonly position = GROUP_INDEX;

  constructor(
    character: string,
    public readonly category: string
  ) {
    super(character, `Invalid group '${formatCharacter(character)}' for category ${category}`);
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), category: this.category };
  }
}

/**
 * A character outside the closed alphabet of one attribute enumeration.
 *
 * `position` is undefined only when an AttributeCodec decodes a lone character
 * outside of a code.
 */
export class InvalidAttributeError extends CfiError {
  override readonly code = 'INVALID_ATTRIBUTE';

  constructor(
    public readonly character: string,
    public readonly position: AttributePosition | undefined,
    public readonly attribute: string,
    public readonly attributeName: string
  ) {
    super(
      position === undefined
        ? `Invalid ${attributeName} '${formatCharacter(character)}'`
        : `Invalid ${attributeName} '${formatCharacter(character)}' at position ${position}`
    );
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      attribute: this.attribute,
      attributeName: this.attributeName,
      character: this.character,
      position: this.position,
    };
  }
}

/**
 * Everything `parse` can return on failure.
 */
export type CfiParseError = InvalidLengthError | InvalidCategoryError | InvalidGroupError | InvalidAttributeError;

/**
 * The taxonomy tables failed validation
 */
export class TaxonomyError extends CfiError {
  override readonly code = 'INVALID_TAXONOMY';

  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}:\n${issues.map((issue) => `  - ${issue}`).join('\n')}` : message);
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), issues: this.issues };
  }
}

import { err, ok, type Result } from 'neverthrow';

import { UNDEFINED_CODE, UNDEFINED_KEY, type AttributePosition } from '../constants.js';
import { InvalidAttributeError } from '../errors/index.js';

export interface AttributeValueDefinition {
  code: string;
  key: string;
  name: string;
  description?: string | undefined;
}

/** Identifies the closed enumeration an attribute value belongs to. */
export interface EnumerationInfo {
  readonly id: string;
  readonly name: string;
}

const UNDEFINED_NAME = 'Not applicable/undefined';

/**
 * One decoded attribute character. Immutable; equality is by enumeration and code.
 */
export class Attribute {
  constructor(
    readonly code: string,
    readonly key: string,
    readonly name: string,
    readonly description: string | undefined,
    readonly enumeration: EnumerationInfo
  ) {}

  is(key: string): boolean {
    return this.key === key;
  }

  isUndefined(): boolean {
    return this.code === UNDEFINED_CODE;
  }

  equals(other: Attribute): boolean {
    return this.enumeration.id === other.enumeration.id && this.code === other.code;
  }

  toString(): string {
    return this.code;
  }

  toJSON(): Record<string, unknown> {
    return { code: this.code, enumeration: this.enumeration.id, key: this.key, name: this.name };
  }
}

/**
 * Leaf codec: a closed enumeration of single-character values plus `X` (undefined).
 */
export class AttributeCodec {
  readonly enumeration: EnumerationInfo;
  readonly undefinedValue: Attribute;

  private readonly byCode = new Map<string, Attribute>();
  private readonly byKey = new Map<string, Attribute>();

  constructor(id: string, name: string, values: readonly AttributeValueDefinition[]) {
    this.enumeration = { id, name };
    this.undefinedValue = new Attribute(UNDEFINED_CODE, UNDEFINED_KEY, UNDEFINED_NAME, undefined, this.enumeration);

    for (const value of values) {
      const attribute = new Attribute(value.code, value.key, value.name, value.description, this.enumeration);
      this.byCode.set(attribute.code, attribute);
      this.byKey.set(attribute.key, attribute);
    }
  }

  get id(): string {
    return this.enumeration.id;
  }

  get name(): string {
    return this.enumeration.name;
  }

  /** Members of the enumeration, without the undefined value. */
  get values(): readonly Attribute[] {
    return [...this.byCode.values()];
  }

  /** Every accepted character, `X` last. */
  get alphabet(): readonly string[] {
    return [...this.byCode.keys(), UNDEFINED_CODE];
  }

  accepts(char: string): boolean {
    return char === UNDEFINED_CODE || this.byCode.has(char);
  }

  /**
   * Look up a member by code or key. `X` and `undefined` return the undefined value.
   */
  value(codeOrKey: string): Attribute | undefined {
    if (codeOrKey === UNDEFINED_CODE || codeOrKey === UNDEFINED_KEY) {
      return this.undefinedValue;
    }
    return this.byCode.get(codeOrKey) ?? this.byKey.get(codeOrKey);
  }

  decode(char: string, position?: AttributePosition): Result<Attribute, InvalidAttributeError> {
    if (char === UNDEFINED_CODE) {
      return ok(this.undefinedValue);
    }
    const attribute = this.byCode.get(char);
    if (!attribute) {
      return err(new InvalidAttributeError(char, position, this.enumeration.id, this.enumeration.name));
    }
    return ok(attribute);
  }

  encode(attribute: Attribute): string {
    return attribute.code;
  }
}

/** Enumeration with no members: only `X` is accepted. */
export const NOT_APPLICABLE = new AttributeCodec('notApplicable', UNDEFINED_NAME, []);

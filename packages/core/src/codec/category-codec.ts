import { err, type Result } from 'neverthrow';

import type { StructuredCategory } from '../categories.js';
import { CFI_LENGTH, GROUP_INDEX } from '../constants.js';
import {
  InvalidGroupError,
  InvalidLengthError,
  type InvalidAttributeError,
} from '../errors/index.js';

import { encodeAttributes, type Group, type GroupCodec } from './group-codec.js';

/**
 * A decoded structured category: which category, and the group decoded inside it.
 */
export class Category {
  constructor(
    readonly info: StructuredCategory,
    readonly group: Group
  ) {}

  get code(): StructuredCategory['code'] {
    return this.info.code;
  }

  get key(): StructuredCategory['key'] {
    return this.info.key;
  }

  get name(): string {
    return this.info.name;
  }

  /** Whether the decoded group has the given key. */
  is(groupKey: string): boolean {
    return this.group.is(groupKey);
  }

  equals(other: Category): boolean {
    return this.info.code === other.info.code && this.group.equals(other.group);
  }

  toString(): string {
    return `${this.info.code}${this.group.code}${encodeAttributes(this.group)}`;
  }
}

export class CategoryCodec {
  private readonly byCode = new Map<string, GroupCodec>();
  private readonly byKey = new Map<string, GroupCodec>();

  constructor(
    readonly info: StructuredCategory,
    groups: readonly GroupCodec[]
  ) {
    for (const group of groups) {
      this.byCode.set(group.code, group);
      this.byKey.set(group.key, group);
    }
  }

  get code(): StructuredCategory['code'] {
    return this.info.code;
  }

  get key(): StructuredCategory['key'] {
    return this.info.key;
  }

  get groups(): readonly GroupCodec[] {
    return [...this.byCode.values()];
  }

  group(codeOrKey: string): GroupCodec | undefined {
    return this.byCode.get(codeOrKey) ?? this.byKey.get(codeOrKey);
  }

  /**
   * Decode a full code whose category character has already been matched.
   * Position 1 selects the group; errors from the group pass through unchanged.
   */
  decode(input: string): Result<Category, InvalidLengthError | InvalidGroupError | InvalidAttributeError> {
    if (input.length !== CFI_LENGTH) {
      return err(new InvalidLengthError(input.length));
    }

    const groupChar = input.charAt(GROUP_INDEX);
    const groupCodec = this.byCode.get(groupChar);
    if (!groupCodec) {
      return err(new InvalidGroupError(groupChar, this.info.key));
    }

    return groupCodec.decode(input).map((group) => new Category(this.info, group));
  }

  encode(category: Category): string {
    return category.toString();
  }
}

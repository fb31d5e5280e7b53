import type { CategoryInfo, CategoryKey, StructuredCategory, UnstructuredCategory } from './categories.js';
import type { Attribute } from './codec/attribute-codec.js';
import type { Category } from './codec/category-codec.js';
import type { Group, Quad } from './codec/group-codec.js';
import { toAsciiBytes } from './utils/characters.js';

/**
 * Behaviour shared by every decoded code. Instances only come out of a successful parse.
 */
abstract class BaseCode {
  abstract readonly structured: boolean;
  abstract readonly category: CategoryInfo;

  abstract toString(): string;

  /** The six code characters as bytes, one per character. */
  toBytes(): Uint8Array {
    return toAsciiBytes(this.toString());
  }

  equals(other: Code): boolean {
    return this.toString() === other.toString();
  }

  toJSON(): string {
    return this.toString();
  }

  isEquity(): this is StructuredCode {
    return this.hasCategory('equity');
  }

  isDebt(): this is StructuredCode {
    return this.hasCategory('debt');
  }

  isCiv(): this is StructuredCode {
    return this.hasCategory('civ');
  }

  isEntitlement(): this is StructuredCode {
    return this.hasCategory('right');
  }

  isListedOption(): this is StructuredCode {
    return this.hasCategory('listedOption');
  }

  isFuture(): this is StructuredCode {
    return this.hasCategory('future');
  }

  isSwap(): this is StructuredCode {
    return this.hasCategory('swap');
  }

  isUnlistedOption(): this is StructuredCode {
    return this.hasCategory('unlistedOption');
  }

  isSpot(): this is UnstructuredCode {
    return this.hasCategory('spot');
  }

  isForward(): this is UnstructuredCode {
    return this.hasCategory('forward');
  }

  isStrategy(): this is UnstructuredCode {
    return this.hasCategory('strategy');
  }

  isFinancing(): this is UnstructuredCode {
    return this.hasCategory('financing');
  }

  isReferential(): this is UnstructuredCode {
    return this.hasCategory('referential');
  }

  isMisc(): this is UnstructuredCode {
    return this.hasCategory('misc');
  }

  private hasCategory(key: CategoryKey): boolean {
    return this.category.key === key;
  }
}

/** A code in a category with a group and attribute schema. */
export class StructuredCode extends BaseCode {
  override readonly structured = true;

  constructor(readonly value: Category) {
    super();
  }

  override get category(): StructuredCategory {
    return this.value.info;
  }

  get group(): Group {
    return this.value.group;
  }

  get attributes(): Quad<Attribute> {
    return this.value.group.attributes;
  }

  /** Attribute by field name, e.g. `votingRight` on common shares. */
  attribute(field: string): Attribute | undefined {
    return this.value.group.get(field);
  }

  override toString(): string {
    return this.value.toString();
  }
}

/**
 * A code in a category without internal structure. The five characters after the
 * category are kept exactly as given.
 */
export class UnstructuredCode extends BaseCode {
  override readonly structured = false;

  constructor(
    override readonly category: UnstructuredCategory,
    readonly tail: string
  ) {
    super();
  }

  override toString(): string {
    return `${this.category.code}${this.tail}`;
  }
}

export type Code = StructuredCode | UnstructuredCode;

import { err, type Result } from 'neverthrow';

import { ATTRIBUTE_POSITIONS, CFI_LENGTH, type AttributePosition } from '../constants.js';
import { InvalidLengthError, type InvalidAttributeError } from '../errors/index.js';

import type { Attribute, AttributeCodec } from './attribute-codec.js';

export type Quad<T> = readonly [T, T, T, T];

export interface GroupInfo {
  readonly code: string;
  readonly key: string;
  readonly name: string;
  readonly description: string | undefined;
}

/** Binds one attribute enumeration to one position of the code, under a field name. */
export interface GroupSlot {
  readonly position: AttributePosition;
  readonly field: string;
  readonly codec: AttributeCodec;
}

export interface GroupEntry {
  readonly position: AttributePosition;
  readonly field: string;
  readonly attribute: Attribute;
}

/**
 * A decoded group: its identity plus the four attributes at positions 2 to 5.
 */
export class Group {
  constructor(
    readonly info: GroupInfo,
    readonly fields: Quad<string>,
    readonly attributes: Quad<Attribute>
  ) {}

  get code(): string {
    return this.info.code;
  }

  get key(): string {
    return this.info.key;
  }

  get name(): string {
    return this.info.name;
  }

  get description(): string | undefined {
    return this.info.description;
  }

  get(field: string): Attribute | undefined {
    const index = this.fields.indexOf(field);
    return index === -1 ? undefined : this.attributes[index];
  }

  /** Field, attribute and position for each of positions 2 to 5. */
  entries(): GroupEntry[] {
    const [f2, f3, f4, f5] = this.fields;
    const [a2, a3, a4, a5] = this.attributes;
    return [
      { position: 2, field: f2, attribute: a2 },
      { position: 3, field: f3, attribute: a3 },
      { position: 4, field: f4, attribute: a4 },
      { position: 5, field: f5, attribute: a5 },
    ];
  }

  is(key: string): boolean {
    return this.info.key === key;
  }

  equals(other: Group): boolean {
    return this.code === other.code && this.attributes.every((attribute, i) => {
      const theirs = other.attributes[i];
      return theirs !== undefined && attribute.equals(theirs);
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      key: this.key,
      attributes: Object.fromEntries(this.entries().map(({ field, attribute }) => [field, attribute.key])),
    };
  }
}

/** The four attribute characters of a group, in position order. */
export function encodeAttributes(group: Group): string {
  return group.attributes.map((attribute) => attribute.code).join('');
}

/**
 * Decodes positions 2 to 5 of a code against the enumerations bound by one group schema.
 */
export class GroupCodec {
  /**
   * @throws RangeError unless the slots hold positions 2, 3, 4 and 5 in that order
   */
  constructor(
    readonly info: GroupInfo,
    readonly slots: Quad<GroupSlot>
  ) {
    const positions = slots.map((slot) => slot.position);
    if (positions.some((position, i) => position !== ATTRIBUTE_POSITIONS[i])) {
      throw new RangeError(`Group ${info.code} slots must cover positions 2-5 in order, got ${positions.join(',')}`);
    }
  }

  get code(): string {
    return this.info.code;
  }

  get key(): string {
    return this.info.key;
  }

  get fields(): Quad<string> {
    const [s2, s3, s4, s5] = this.slots;
    return [s2.field, s3.field, s4.field, s5.field];
  }

  slot(field: string): GroupSlot | undefined {
    return this.slots.find((slot) => slot.field === field);
  }

  /**
   * Decode the attribute positions of a full six-character code.
   * Stops at the first position that fails.
   */
  decode(input: string): Result<Group, InvalidLengthError | InvalidAttributeError> {
    if (input.length !== CFI_LENGTH) {
      return err(new InvalidLengthError(input.length));
    }

    const [s2, s3, s4, s5] = this.slots;
    return decodeSlot(s2, input).andThen((a2) =>
      decodeSlot(s3, input).andThen((a3) =>
        decodeSlot(s4, input).andThen((a4) =>
          decodeSlot(s5, input).map((a5) => new Group(this.info, this.fields, [a2, a3, a4, a5]))
        )
      )
    );
  }

  encode(group: Group): string {
    return encodeAttributes(group);
  }
}

function decodeSlot(slot: GroupSlot, input: string): Result<Attribute, InvalidAttributeError> {
  return slot.codec.decode(input.charAt(slot.position), slot.position);
}

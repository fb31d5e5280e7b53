import { describe, expect, it } from 'vitest';

import { InvalidAttributeError } from '../../errors/index.js';
import { AttributeCodec, NOT_APPLICABLE } from '../attribute-codec.js';

const votingRight = new AttributeCodec('votingRight', 'Voting right', [
  { code: 'V', key: 'voting', name: 'Voting' },
  { code: 'N', key: 'nonVoting', name: 'Non-voting', description: 'No vote at general meetings' },
]);

describe('AttributeCodec', () => {
  it('decodes a member of the enumeration', () => {
    const attribute = votingRight.decode('V')._unsafeUnwrap();

    expect(attribute.code).toBe('V');
    expect(attribute.key).toBe('voting');
    expect(attribute.name).toBe('Voting');
    expect(attribute.description).toBeUndefined();
    expect(attribute.enumeration).toEqual({ id: 'votingRight', name: 'Voting right' });
    expect(attribute.is('voting')).toBe(true);
    expect(attribute.isUndefined()).toBe(false);
  });

  it('keeps member descriptions', () => {
    expect(votingRight.decode('N')._unsafeUnwrap().description).toBe('No vote at general meetings');
  });

  it('decodes X as the undefined value', () => {
    const attribute = votingRight.decode('X', 2)._unsafeUnwrap();

    expect(attribute.isUndefined()).toBe(true);
    expect(attribute.key).toBe('undefined');
    expect(attribute.name).toBe('Not applicable/undefined');
    expect(attribute).toBe(votingRight.undefinedValue);
  });

  it('rejects characters outside the enumeration with their position', () => {
    const error = votingRight.decode('Q', 3)._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(InvalidAttributeError);
    expect(error.character).toBe('Q');
    expect(error.position).toBe(3);
    expect(error.attribute).toBe('votingRight');
    expect(error.attributeName).toBe('Voting right');
    expect(error.message).toBe("Invalid Voting right 'Q' at position 3");
  });

  it('omits the position when decoding a lone character', () => {
    const error = votingRight.decode('q')._unsafeUnwrapErr();

    expect(error.position).toBeUndefined();
    expect(error.message).toBe("Invalid Voting right 'q'");
  });

  it('exposes its values and alphabet', () => {
    expect(votingRight.values.map((value) => value.key)).toEqual(['voting', 'nonVoting']);
    expect(votingRight.alphabet).toEqual(['V', 'N', 'X']);
    expect(votingRight.id).toBe('votingRight');
    expect(votingRight.name).toBe('Voting right');
  });

  it('accepts only members and X', () => {
    expect(votingRight.accepts('V')).toBe(true);
    expect(votingRight.accepts('X')).toBe(true);
    expect(votingRight.accepts('v')).toBe(false);
    expect(votingRight.accepts('R')).toBe(false);
  });

  it('looks values up by code or key', () => {
    expect(votingRight.value('nonVoting')?.code).toBe('N');
    expect(votingRight.value('V')?.key).toBe('voting');
    expect(votingRight.value('undefined')).toBe(votingRight.undefinedValue);
    expect(votingRight.value('Z')).toBeUndefined();
  });

  it('encodes an attribute back to its character', () => {
    expect(votingRight.encode(votingRight.decode('N')._unsafeUnwrap())).toBe('N');
    expect(votingRight.encode(votingRight.undefinedValue)).toBe('X');
  });

  it('compares attributes by enumeration and code', () => {
    const other = new AttributeCodec('ownership', 'Ownership', [{ code: 'V', key: 'voting', name: 'Voting' }]);

    expect(votingRight.decode('V')._unsafeUnwrap().equals(votingRight.decode('V')._unsafeUnwrap())).toBe(true);
    expect(votingRight.decode('V')._unsafeUnwrap().equals(other.decode('V')._unsafeUnwrap())).toBe(false);
  });
});

describe('NOT_APPLICABLE', () => {
  it('accepts only X', () => {
    expect(NOT_APPLICABLE.alphabet).toEqual(['X']);
    expect(NOT_APPLICABLE.decode('X', 4).isOk()).toBe(true);

    const error = NOT_APPLICABLE.decode('A', 4)._unsafeUnwrapErr();
    expect(error.attribute).toBe('notApplicable');
    expect(error.position).toBe(4);
  });
});

import { describe, expect, it } from 'vitest';

import { InvalidAttributeError, InvalidLengthError } from '../../errors/index.js';
import { AttributeCodec, NOT_APPLICABLE } from '../attribute-codec.js';
import { GroupCodec } from '../group-codec.js';

const votingRight = new AttributeCodec('votingRight', 'Voting right', [
  { code: 'V', key: 'voting', name: 'Voting' },
  { code: 'N', key: 'nonVoting', name: 'Non-voting' },
]);

const form = new AttributeCodec('form', 'Form', [
  { code: 'B', key: 'bearer', name: 'Bearer' },
  { code: 'R', key: 'registered', name: 'Registered' },
]);

const common = new GroupCodec({ code: 'S', key: 'common', name: 'Common shares', description: undefined }, [
  { position: 2, field: 'votingRight', codec: votingRight },
  { position: 3, field: 'notApplicable3', codec: NOT_APPLICABLE },
  { position: 4, field: 'notApplicable4', codec: NOT_APPLICABLE },
  { position: 5, field: 'form', codec: form },
]);

describe('GroupCodec', () => {
  it('decodes positions 2 to 5 into named attributes', () => {
    const group = common.decode('ESVXXR')._unsafeUnwrap();

    expect(group.code).toBe('S');
    expect(group.key).toBe('common');
    expect(group.name).toBe('Common shares');
    expect(group.is('common')).toBe(true);
    expect(group.get('votingRight')?.key).toBe('voting');
    expect(group.get('notApplicable3')?.isUndefined()).toBe(true);
    expect(group.get('form')?.key).toBe('registered');
    expect(group.get('ownership')).toBeUndefined();
  });

  it('lists entries with their positions', () => {
    const group = common.decode('ESNXXB')._unsafeUnwrap();

    expect(group.entries().map(({ position, field, attribute }) => [position, field, attribute.code])).toEqual([
      [2, 'votingRight', 'N'],
      [3, 'notApplicable3', 'X'],
      [4, 'notApplicable4', 'X'],
      [5, 'form', 'B'],
    ]);
  });

  it('encodes the four attribute characters', () => {
    expect(common.encode(common.decode('ESVXXR')._unsafeUnwrap())).toBe('VXXR');
    expect(common.encode(common.decode('ESXXXX')._unsafeUnwrap())).toBe('XXXX');
  });

  it('requires slots at positions 2 to 5 in order', () => {
    const [s2, s3, s4, s5] = common.slots;

    expect(() => new GroupCodec(common.info, [s5, s3, s4, s2])).toThrow(
      'Group S slots must cover positions 2-5 in order, got 5,3,4,2'
    );
    expect(() => new GroupCodec(common.info, [s2, s2, s4, s5])).toThrow(RangeError);
  });

  it('rejects input that is not six characters', () => {
    const error = common.decode('ESVXX')._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(InvalidLengthError);
    expect(error.code).toBe('INVALID_LENGTH');
  });

  it('reports the first invalid position only', () => {
    const error = common.decode('ESQAXZ')._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(InvalidAttributeError);
    expect(error).toMatchObject({ character: 'Q', position: 2, attribute: 'votingRight' });
  });

  it('rejects anything but X at a not-applicable position', () => {
    expect(common.decode('ESVAXR')._unsafeUnwrapErr()).toMatchObject({
      character: 'A',
      position: 3,
      attribute: 'notApplicable',
    });
  });

  it('validates the last position', () => {
    expect(common.decode('ESVXXZ')._unsafeUnwrapErr()).toMatchObject({ character: 'Z', position: 5, attribute: 'form' });
  });

  it('exposes its fields and slots', () => {
    expect(common.fields).toEqual(['votingRight', 'notApplicable3', 'notApplicable4', 'form']);
    expect(common.slot('form')?.position).toBe(5);
    expect(common.slot('ownership')).toBeUndefined();
  });

  it('compares groups by code and attributes', () => {
    const group = common.decode('ESVXXR')._unsafeUnwrap();

    expect(group.equals(common.decode('ESVXXR')._unsafeUnwrap())).toBe(true);
    expect(group.equals(common.decode('ESVXXB')._unsafeUnwrap())).toBe(false);
  });

  it('serializes to field keys', () => {
    expect(common.decode('ESVXXR')._unsafeUnwrap().toJSON()).toEqual({
      code: 'S',
      key: 'common',
      attributes: {
        votingRight: 'voting',
        notApplicable3: 'undefined',
        notApplicable4: 'undefined',
        form: 'registered',
      },
    });
  });
});

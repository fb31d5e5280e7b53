import { describe, expect, it } from 'vitest';

import {
  CfiError,
  InvalidAttributeError,
  InvalidCategoryError,
  InvalidGroupError,
  InvalidLengthError,
  TaxonomyError,
} from './index.js';

describe('CfiError subclasses', () => {
  it('InvalidLengthError reports the length it saw', () => {
    const error = new InvalidLengthError(2);

    expect(error).toBeInstanceOf(CfiError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('InvalidLengthError');
    expect(error.message).toBe('CFI code must be 6 characters, got 2');
    expect(error.toJSON()).toEqual({
      code: 'INVALID_LENGTH',
      message: 'CFI code must be 6 characters, got 2',
      name: 'InvalidLengthError',
      severity: 'error',
      length: 2,
    });
  });

  it('InvalidCategoryError sits at position 0', () => {
    const error = new InvalidCategoryError('Q');

    expect(error.position).toBe(0);
    expect(error.character).toBe('Q');
    expect(error.message).toBe("Invalid CFI category 'Q'");
  });

  it('escapes non-printable characters in messages but keeps the raw character', () => {
    const error = new InvalidCategoryError('\u0000');

    expect(error.message).toBe("Invalid CFI category '\\u0000'");
    expect(error.character).toBe('\u0000');
  });

  it('InvalidGroupError names the category', () => {
    const error = new InvalidGroupError('Z', 'equity');

    expect(error.toJSON()).toEqual({
      code: 'INVALID_GROUP',
      message: "Invalid group 'Z' for category equity",
      name: 'InvalidGroupError',
      severity: 'error',
      character: 'Z',
      position: 1,
      category: 'equity',
    });
  });

  it('InvalidAttributeError names the enumeration and position', () => {
    const error = new InvalidAttributeError('9', 5, 'form', 'Form');

    expect(error.message).toBe("Invalid Form '9' at position 5");
    expect(error.toJSON()).toMatchObject({
      code: 'INVALID_ATTRIBUTE',
      character: '9',
      position: 5,
      attribute: 'form',
      attributeName: 'Form',
    });
  });

  it('TaxonomyError lists its issues', () => {
    expect(new TaxonomyError('Invalid taxonomy file a.json', ['x: bad', 'y: worse']).message).toBe(
      'Invalid taxonomy file a.json:\n  - x: bad\n  - y: worse'
    );
    expect(new TaxonomyError('Taxonomy is missing categories').message).toBe('Taxonomy is missing categories');
    expect(new TaxonomyError('t', ['i']).toJSON()['issues']).toEqual(['i']);
  });
});

import type { Result } from 'neverthrow';

import type { CategoryCode, CategoryKey } from './categories.js';
import type { Code } from './code.js';
import type { AttributePosition } from './constants.js';
import type { CfiParseError } from './errors/index.js';
import { parseCfi, type CfiParser } from './parser.js';

export interface AttributeDescription {
  position: AttributePosition;
  field: string;
  /** Name of the enumeration, e.g. "Voting right". */
  enumeration: string;
  code: string;
  key: string;
  name: string;
}

export interface GroupDescription {
  code: string;
  key: string;
  name: string;
  description: string | undefined;
}

/**
 * A decoded code as plain data. Unstructured codes have no group and no attributes.
 */
export interface CodeDescription {
  code: string;
  category: {
    code: CategoryCode;
    key: CategoryKey;
    name: string;
  };
  group: GroupDescription | undefined;
  attributes: AttributeDescription[];
}

export function describeCode(code: Code): CodeDescription {
  const category = { code: code.category.code, key: code.category.key, name: code.category.name };

  if (!code.structured) {
    return { code: code.toString(), category, group: undefined, attributes: [] };
  }

  const group = code.group;
  const attributes = group.entries().map(
    ({ position, field, attribute }): AttributeDescription => ({
      position,
      field,
      enumeration: attribute.enumeration.name,
      code: attribute.code,
      key: attribute.key,
      name: attribute.name,
    })
  );

  return {
    code: code.toString(),
    category,
    group: { code: group.code, key: group.key, name: group.name, description: group.description },
    attributes,
  };
}

/**
 * Parse and describe in one step, with the default parser unless one is given.
 */
export function describeCfi(input: string | Uint8Array, parser?: CfiParser): Result<CodeDescription, CfiParseError> {
  return (parser ? parser.parse(input) : parseCfi(input)).map(describeCode);
}

import { isStrictUnstructured } from '@iso10962/env';
import { getLogger, type Logger } from '@iso10962/logger';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { findCategoryByCode, isStructuredCategory, type UnstructuredCategory } from './categories.js';
import { StructuredCode, UnstructuredCode, type Code } from './code.js';
import { NOT_APPLICABLE } from './codec/attribute-codec.js';
import { ATTRIBUTE_POSITIONS, CATEGORY_INDEX, CFI_LENGTH, GROUP_INDEX, UNDEFINED_CODE } from './constants.js';
import {
  InvalidAttributeError,
  InvalidCategoryError,
  InvalidGroupError,
  InvalidLengthError,
  type CfiParseError,
} from './errors/index.js';
import { getTaxonomy, Taxonomy } from './taxonomy/loader.js';
import { isSingleByte, toCodeString } from './utils/characters.js';

function isLogger(value: unknown): value is Logger {
  return (
    typeof value === 'object' &&
    value !== null &&
    'debug' in value &&
    typeof value.debug === 'function' &&
    'isLevelEnabled' in value &&
    typeof value.isLevelEnabled === 'function'
  );
}

export const CfiParserOptionsSchema = z
  .object({
    /** Require `X` at positions 1 to 5 of unstructured categories. Defaults to `CFI_STRICT_UNSTRUCTURED`. */
    strictUnstructured: z.boolean().optional(),
    /** Taxonomy to decode against. Defaults to the cached default taxonomy. */
    taxonomy: z.instanceof(Taxonomy).optional(),
    logger: z.custom<Logger>(isLogger, 'must be a logger').optional(),
  })
  .strict();

export type CfiParserOptions = z.input<typeof CfiParserOptionsSchema>;

/**
 * Root dispatcher. Position 0 selects the category; structured categories delegate
 * to their CategoryCodec, unstructured ones keep the remaining characters.
 */
export class CfiParser {
  readonly strictUnstructured: boolean;
  readonly taxonomy: Taxonomy;
  private readonly logger: Logger;

  /**
   * @throws ZodError when the options are invalid
   */
  constructor(options: CfiParserOptions = {}) {
    const parsed = CfiParserOptionsSchema.parse(options);
    this.strictUnstructured = parsed.strictUnstructured ?? isStrictUnstructured();
    this.taxonomy = parsed.taxonomy ?? getTaxonomy();
    this.logger = parsed.logger ?? getLogger('cfi-parser');
  }

  /**
   * Parse a six-character code. Byte input is read one character per byte.
   * The first invalid position in scan order is reported.
   */
  parse(input: string | Uint8Array): Result<Code, CfiParseError> {
    const code = toCodeString(input);
    const result = this.decode(code);

    if (result.isErr() && this.logger.isLevelEnabled('debug')) {
      const error = result.error;
      this.logger.debug(
        {
          input: code,
          code: error.code,
          ...(error instanceof InvalidLengthError ? { length: error.length } : { position: error.position }),
        },
        'Rejected CFI code'
      );
    }
    return result;
  }

  serialize(code: Code): string {
    return code.toString();
  }

  private decode(code: string): Result<Code, CfiParseError> {
    if (code.length !== CFI_LENGTH) {
      return err(new InvalidLengthError(code.length));
    }

    const categoryChar = code.charAt(CATEGORY_INDEX);
    const category = findCategoryByCode(categoryChar);
    if (!category) {
      return err(new InvalidCategoryError(categoryChar));
    }

    if (isStructuredCategory(category)) {
      return this.taxonomy
        .codecFor(category)
        .decode(code)
        .map((value) => new StructuredCode(value));
    }
    return this.decodeUnstructured(category, code);
  }

  /**
   * Strict mode takes only `X` after the category. Lenient mode keeps the tail as is,
   * but still rejects characters that do not fit in one byte.
   */
  private decodeUnstructured(category: UnstructuredCategory, code: string): Result<Code, CfiParseError> {
    const accepts = (char: string): boolean => (this.strictUnstructured ? char === UNDEFINED_CODE : isSingleByte(char));

    const groupChar = code.charAt(GROUP_INDEX);
    if (!accepts(groupChar)) {
      return err(new InvalidGroupError(groupChar, category.key));
    }
    for (const position of ATTRIBUTE_POSITIONS) {
      const char = code.charAt(position);
      if (!accepts(char)) {
        return err(new InvalidAttributeError(char, position, NOT_APPLICABLE.id, NOT_APPLICABLE.name));
      }
    }
    return ok(new UnstructuredCode(category, code.slice(GROUP_INDEX)));
  }
}

let defaultParser: CfiParser | undefined;

function getDefaultParser(): CfiParser {
  if (!defaultParser) {
    defaultParser = new CfiParser();
  }
  return defaultParser;
}

export function parseCfi(input: string | Uint8Array): Result<Code, CfiParseError> {
  return getDefaultParser().parse(input);
}

export function serializeCfi(code: Code): string {
  return getDefaultParser().serialize(code);
}

export function isValidCfi(input: string | Uint8Array): boolean {
  return parseCfi(input).isOk();
}

/** Drop the default parser so the next call re-reads the environment. */
export function resetDefaultParser(): void {
  defaultParser = undefined;
}

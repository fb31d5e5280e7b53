import { readFileSync } from 'node:fs';
import { basename, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { getTaxonomyDirectory } from '@iso10962/env';
import { getLogger } from '@iso10962/logger';
import { err, ok, type Result } from 'neverthrow';

import {
  CATEGORIES,
  findCategoryByCode,
  findCategoryByKey,
  isStructuredCategory,
  type StructuredCategory,
  type StructuredCategoryKey,
} from '../categories.js';
import { AttributeCodec } from '../codec/attribute-codec.js';
import { CategoryCodec } from '../codec/category-codec.js';
import { GroupCodec, type GroupSlot } from '../codec/group-codec.js';
import { ATTRIBUTE_POSITIONS } from '../constants.js';
import { TaxonomyError } from '../errors/index.js';
import { getErrorMessage } from '../utils/type-guard-utils.js';
import { formatZodIssues, fromZod } from '../utils/zod-utils.js';

import { CategoryFileSchema, SharedFileSchema, type EnumerationData, type GroupData } from './schemas.js';

const logger = getLogger('taxonomy');

/** Tables shipped with this package. */
export const DEFAULT_TAXONOMY_DIRECTORY = fileURLToPath(new URL('../../data/taxonomy/', import.meta.url));

export const SHARED_FILE = 'shared.json';
const SHARED_PREFIX = 'shared:';

const STRUCTURED_CATEGORIES: readonly StructuredCategory[] = CATEGORIES.filter(isStructuredCategory);

type CategoryCodecs = Record<StructuredCategoryKey, CategoryCodec>;

/**
 * The loaded group and attribute schemas of every structured category.
 */
export class Taxonomy {
  constructor(
    private readonly codecs: CategoryCodecs,
    readonly directory: string
  ) {}

  get categories(): readonly CategoryCodec[] {
    return STRUCTURED_CATEGORIES.map((category) => this.codecs[category.key]);
  }

  /** Codec for a structured category, by code (`E`) or key (`equity`). */
  category(codeOrKey: string): CategoryCodec | undefined {
    const info = findCategoryByCode(codeOrKey) ?? findCategoryByKey(codeOrKey);
    return info && isStructuredCategory(info) ? this.codecs[info.key] : undefined;
  }

  codecFor(category: StructuredCategory): CategoryCodec {
    return this.codecs[category.key];
  }
}

function readJson(file: string): Result<unknown, TaxonomyError> {
  try {
    const data: unknown = JSON.parse(readFileSync(file, 'utf8'));
    return ok(data);
  } catch (error) {
    return err(new TaxonomyError(`Failed to read ${basename(file)}`, [getErrorMessage(error)]));
  }
}

function buildCodecs(enumerations: Record<string, EnumerationData>, prefix = ''): Map<string, AttributeCodec> {
  const codecs = new Map<string, AttributeCodec>();
  for (const [id, enumeration] of Object.entries(enumerations)) {
    codecs.set(`${prefix}${id}`, new AttributeCodec(id, enumeration.name, enumeration.values));
  }
  return codecs;
}

function buildGroup(
  group: GroupData,
  codecs: ReadonlyMap<string, AttributeCodec>,
  fileName: string,
  groupIndex: number
): Result<GroupCodec, TaxonomyError> {
  const issues: string[] = [];
  const slots: GroupSlot[] = [];

  group.attributes.forEach((slot, index) => {
    const codec = codecs.get(slot.attribute);
    const position = ATTRIBUTE_POSITIONS[index];
    if (!codec || position === undefined) {
      issues.push(`groups.${groupIndex}.attributes.${index}.attribute: unknown enumeration '${slot.attribute}'`);
      return;
    }
    slots.push({ position, field: slot.field, codec });
  });

  const [s2, s3, s4, s5] = slots;
  if (issues.length > 0 || !s2 || !s3 || !s4 || !s5) {
    return err(new TaxonomyError(`Invalid taxonomy file ${fileName}`, issues));
  }

  const info = { code: group.code, key: group.key, name: group.name, description: group.description };
  return ok(new GroupCodec(info, [s2, s3, s4, s5]));
}

function loadCategory(
  directory: string,
  category: StructuredCategory,
  shared: ReadonlyMap<string, AttributeCodec>
): Result<CategoryCodec, TaxonomyError> {
  const fileName = `${category.taxonomy}.json`;

  return readJson(join(directory, fileName))
    .andThen((data) =>
      fromZod(CategoryFileSchema, data).mapErr(
        (error) => new TaxonomyError(`Invalid taxonomy file ${fileName}`, formatZodIssues(error))
      )
    )
    .andThen((file): Result<CategoryCodec, TaxonomyError> => {
      const codecs = new Map([...shared, ...buildCodecs(file.attributes)]);
      const groups: GroupCodec[] = [];
      for (const [index, group] of file.groups.entries()) {
        const result = buildGroup(group, codecs, fileName, index);
        if (result.isErr()) {
          return err(result.error);
        }
        groups.push(result.value);
      }
      return ok(new CategoryCodec(category, groups));
    });
}

function isComplete(codecs: Partial<CategoryCodecs>): codecs is CategoryCodecs {
  return STRUCTURED_CATEGORIES.every((category) => codecs[category.key] !== undefined);
}

/**
 * Read and validate every taxonomy table in a directory.
 *
 * Defaults to `CFI_TAXONOMY_DIR` when set, otherwise the bundled tables.
 */
export function loadTaxonomy(directory?: string): Result<Taxonomy, TaxonomyError> {
  const dir = directory ?? getTaxonomyDirectory() ?? DEFAULT_TAXONOMY_DIRECTORY;

  const result: Result<Taxonomy, TaxonomyError> = readJson(join(dir, SHARED_FILE))
    .andThen((data) =>
      fromZod(SharedFileSchema, data).mapErr(
        (error) => new TaxonomyError(`Invalid taxonomy file ${SHARED_FILE}`, formatZodIssues(error))
      )
    )
    .andThen((sharedFile): Result<Taxonomy, TaxonomyError> => {
      const shared = buildCodecs(sharedFile.attributes, SHARED_PREFIX);
      const codecs: Partial<CategoryCodecs> = {};
      for (const category of STRUCTURED_CATEGORIES) {
        const loaded = loadCategory(dir, category, shared);
        if (loaded.isErr()) {
          return err(loaded.error);
        }
        codecs[category.key] = loaded.value;
      }
      return isComplete(codecs)
        ? ok(new Taxonomy(codecs, dir))
        : err(new TaxonomyError('Taxonomy is missing categories'));
    });

  if (result.isErr()) {
    logger.error({ directory: dir, error: result.error }, 'Failed to load CFI taxonomy');
    return result;
  }

  logger.debug(
    {
      directory: dir,
      categories: result.value.categories.length,
      groups: result.value.categories.reduce((total, category) => total + category.groups.length, 0),
    },
    'Loaded CFI taxonomy'
  );
  return result;
}

const taxonomyCache = new Map<string, Taxonomy>();

/**
 * The taxonomy for the configured directory, loaded once and cached.
 * @throws TaxonomyError when the tables are missing or invalid
 */
export function getTaxonomy(): Taxonomy {
  const directory = getTaxonomyDirectory() ?? DEFAULT_TAXONOMY_DIRECTORY;
  const cached = taxonomyCache.get(directory);
  if (cached) {
    return cached;
  }

  const result = loadTaxonomy(directory);
  if (result.isErr()) {
    throw result.error;
  }
  taxonomyCache.set(directory, result.value);
  return result.value;
}

export function resetTaxonomyCache(): void {
  taxonomyCache.clear();
}

export interface CategoryDefinition {
  readonly code: string;
  readonly key: string;
  readonly name: string;
  /** Taxonomy table holding the groups; absent for categories without internal structure. */
  readonly taxonomy?: string;
}

/**
 * The closed set of CFI categories, selected by the first character of a code.
 */
export const CATEGORIES = [
  { code: 'E', key: 'equity', name: 'Equities', taxonomy: 'equities' },
  { code: 'D', key: 'debt', name: 'Debt instruments', taxonomy: 'debt' },
  { code: 'C', key: 'civ', name: 'Collective investment vehicles', taxonomy: 'civ' },
  { code: 'R', key: 'right', name: 'Entitlements (rights)', taxonomy: 'rights' },
  { code: 'O', key: 'listedOption', name: 'Listed options', taxonomy: 'listed-options' },
  { code: 'F', key: 'future', name: 'Futures', taxonomy: 'futures' },
  { code: 'S', key: 'swap', name: 'Swaps', taxonomy: 'swaps' },
  {
    code: 'H',
    key: 'unlistedOption',
    name: 'Non-listed and complex listed options',
    taxonomy: 'unlisted-options',
  },
  { code: 'I', key: 'spot', name: 'Spot' },
  { code: 'J', key: 'forward', name: 'Forwards' },
  { code: 'K', key: 'strategy', name: 'Strategies' },
  { code: 'L', key: 'financing', name: 'Financing' },
  { code: 'T', key: 'referential', name: 'Referential instruments' },
  { code: 'M', key: 'misc', name: 'Others (miscellaneous)' },
] as const satisfies readonly CategoryDefinition[];

type CategoryEntry = (typeof CATEGORIES)[number];

export type CategoryKey = CategoryEntry['key'];
export type CategoryCode = CategoryEntry['code'];
export type StructuredCategory = Extract<CategoryEntry, { taxonomy: string }>;
export type StructuredCategoryKey = StructuredCategory['key'];
export type UnstructuredCategory = Exclude<CategoryEntry, { taxonomy: string }>;
export type UnstructuredCategoryKey = UnstructuredCategory['key'];
export type CategoryInfo = CategoryEntry;

const BY_CODE: ReadonlyMap<string, CategoryInfo> = new Map(CATEGORIES.map((category) => [category.code, category]));
const BY_KEY: ReadonlyMap<string, CategoryInfo> = new Map(CATEGORIES.map((category) => [category.key, category]));

export function findCategoryByCode(code: string): CategoryInfo | undefined {
  return BY_CODE.get(code);
}

export function findCategoryByKey(key: string): CategoryInfo | undefined {
  return BY_KEY.get(key);
}

export function isStructuredCategory(category: CategoryInfo): category is StructuredCategory {
  return 'taxonomy' in category;
}

/** The length of a CFI code, in characters. */
export const CFI_LENGTH = 6;

/** Index of the category character. */
export const CATEGORY_INDEX = 0;

/** Index of the group character. */
export const GROUP_INDEX = 1;

/** Indices of the four attribute characters, in scan order. */
export const ATTRIBUTE_POSITIONS = [2, 3, 4, 5] as const;

export type AttributePosition = (typeof ATTRIBUTE_POSITIONS)[number];

/** `X`: not applicable/undefined, legal at every attribute position. */
export const UNDEFINED_CODE = 'X';

export const UNDEFINED_KEY = 'undefined';

export * from './constants.js';
export * from './categories.js';
export * from './errors/index.js';
export * from './codec/attribute-codec.js';
export * from './codec/group-codec.js';
export * from './codec/category-codec.js';
export * from './code.js';
export * from './taxonomy/schemas.js';
export * from './taxonomy/loader.js';
export * from './parser.js';
export * from './describe.js';
export { formatCharacter } from './utils/characters.js';

export { addOrEditKeyValPair, addKey, removeKey } from './editor.js';
export { InvalidEntryError } from './types.js';
export type { EditResult, KeyMatchOptions } from './types.js';

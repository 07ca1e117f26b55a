export { chunkDocument, walkFieldMap } from './field-map-walker.js';
export type { WalkContext, ChunkDocumentOptions } from './field-map-walker.js';
export { validateDocument, parseFieldMap, FIELD_MAP_FIELD } from './validation.js';
export { WriteBuffer } from './write-buffer.js';
export { isDocumentMap } from './guards.js';

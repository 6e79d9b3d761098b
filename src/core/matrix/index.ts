export * from './schema.js';
export * from './types.js';
export * from './names.js';
export * from './marker.js';
export * from './changelog.js';
export * from './vertical.js';
export * from './store.js';
export * from './doctor.js';

export * from './Metadata.js';
export * from './Content.js';

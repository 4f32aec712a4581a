export * from './errors';
export * from './dates';
export * from './config/settings';
export * from './config/cities';
export * from './config/credentials';
export * from './table/table';
export * from './table/csv';
export * from './storage/objectStore';
export * from './storage/memoryObjectStore';
export * from './storage/datasets';
export * from './ingest/metadata';
export * from './ingest/archive';
export * from './ingest/transform';
export * from './prompts/series';
export * from './prompts/templates';
export * from './prompts/generator';
export * from './stages/ingestStage';
export * from './stages/promptStage';
export { createProgram } from './cli';

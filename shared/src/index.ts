// Shared types and schemas for the media pipeline

export * from './enums';
export * from './schema';
export * from './pipeline';
export * from './utils';
export * from './storage';

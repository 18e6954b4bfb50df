export * from './types';
export * from './s3-backend';

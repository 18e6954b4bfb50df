export * from './job';
export * from './job-input';

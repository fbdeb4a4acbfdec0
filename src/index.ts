// Main exports for programmatic use

// Remote metadata and version control
export * from './github';
export * from './git';

// Pipeline stages
export * from './references';
export * from './pairs';
export * from './extraction';
export * from './agents';
export * from './dataset';
export * from './pipeline';

// Configuration
export * from './config';

export * from './utils/errors';
export type { ConfirmationRequired } from './utils/confirmation';

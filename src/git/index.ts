export type { Workspace, VcsBackend } from './types';
export { GitBackend } from './backend';

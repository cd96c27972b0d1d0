export { executeHomeCommand } from './home.js';
export type { HomeCommandDeps } from './home.js';
export { executePathCommand } from './path.js';
export type { PathCommandDeps, PathCommandOptions } from './path.js';

/**
 * Command re-exports
 */

export { initCommand } from './init.js';
export { matchCommand } from './match.js';
export { baselineCommand } from './baseline.js';
export { postCommand } from './post.js';
export { verifyCommand } from './verify.js';
export { analyzeCommand } from './analyze.js';
export { sessionsCommand } from './sessions.js';
export { configCommand } from './config.js';

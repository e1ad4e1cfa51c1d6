export { runCommand, execGit, type CommandResult, type RunCommandOptions } from './git-utils.js';

/**
 * @chunkstash/remote-git
 *
 * Git working tree, batch pusher and the GitHub CLI remote host.
 */

export { BatchPusher, type BatchPusherOptions } from './batch-pusher.js';
export { WorkingTree, type WorkingTreeOptions } from './working-tree.js';
export {
  GitHubCli,
  parseRepoSlug,
  parseContentsListing,
  splitJsonDocuments,
  type CommandRunner,
  type ContentEntry,
  type GitHubCliOptions,
} from './github-cli.js';
export { runCommand, execGit, type CommandResult, type RunCommandOptions } from './utils/index.js';

export type { BatchPusherConfig, BatchPusherHooks, PushEvent } from './types.js';
export { DEFAULT_PUSHER_CONFIG } from './types.js';

/**
 * GitHub remote host, driven through the `gh` CLI.
 */

import { z } from 'zod';
import { CommandFailedError, type RemoteHost } from '@chunkstash/core';
import { runCommand, type CommandResult } from './utils/index.js';

const contentEntrySchema = z.object({
  name: z.string(),
  path: z.string().optional(),
  type: z.enum(['file', 'dir', 'symlink', 'submodule']),
});

const contentsPageSchema = z.union([z.array(contentEntrySchema), contentEntrySchema]);

export type ContentEntry = z.infer<typeof contentEntrySchema>;

/**
 * `owner/repo` from `https://github.com/owner/repo(.git)`, `git@github.com:owner/repo.git`
 * or a bare `owner/repo`.
 */
export function parseRepoSlug(repoUrl: string): string {
  const trimmed = repoUrl.trim().replace(/\/+$/, '').replace(/\.git$/, '');
  const match = /^(?:https?:\/\/github\.com\/|git@github\.com:)?([^/\s:]+)\/([^/\s]+)$/.exec(trimmed);
  if (!match || !match[1] || !match[2]) {
    throw new Error(`Not a GitHub repository URL: ${repoUrl}`);
  }
  return `${match[1]}/${match[2]}`;
}

/**
 * Split `gh api --paginate` output, which concatenates one JSON document
 * per page, into the individual documents.
 */
export function splitJsonDocuments(text: string): string[] {
  const documents: string[] = [];
  let depth = 0;
  let start = -1;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === '[' || ch === '{') {
      if (depth === 0) start = i;
      depth++;
    } else if (ch === ']' || ch === '}') {
      depth--;
      if (depth === 0 && start >= 0) {
        documents.push(text.slice(start, i + 1));
        start = -1;
      }
    }
  }
  return documents;
}

/**
 * File names (type `file`) in a contents API listing; unparsable output
 * yields null.
 */
export function parseContentsListing(text: string): Set<string> | null {
  const documents = splitJsonDocuments(text);
  if (documents.length === 0) return null;

  const names = new Set<string>();
  for (const document of documents) {
    let json: unknown;
    try {
      json = JSON.parse(document);
    } catch {
      return null;
    }
    const parsed = contentsPageSchema.safeParse(json);
    if (!parsed.success) return null;

    const entries = Array.isArray(parsed.data) ? parsed.data : [parsed.data];
    for (const entry of entries) {
      if (entry.type === 'file') names.add(entry.name);
    }
  }
  return names;
}

export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

export interface GitHubCliOptions {
  /** Defaults to spawning the real `gh` binary */
  run?: CommandRunner;
}

export class GitHubCli implements RemoteHost {
  private run: CommandRunner;

  constructor(options: GitHubCliOptions = {}) {
    this.run = options.run ?? ((command, args) => runCommand(command, args));
  }

  async checkInstalled(): Promise<boolean> {
    try {
      const result = await this.run('gh', ['--version']);
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }

  async checkAuthenticated(): Promise<boolean> {
    try {
      const result = await this.run('gh', ['auth', 'status']);
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }

  async listExistingFiles(repoUrl: string, remoteFolderPath: string): Promise<Set<string>> {
    const slug = parseRepoSlug(repoUrl);
    const result = await this.run('gh', ['api', `repos/${slug}/contents/${remoteFolderPath}`, '--paginate']);

    if (result.exitCode !== 0) {
      // Folder does not exist yet
      return new Set();
    }

    const names = parseContentsListing(result.stdout);
    if (!names) {
      console.warn(`[Chunkstash:GitHubCli] Could not parse listing of ${remoteFolderPath}, assuming it is empty`);
      return new Set();
    }
    return names;
  }

  async cloneRepo(repoUrl: string, destPath: string): Promise<void> {
    const args = ['repo', 'clone', repoUrl, destPath];
    const result = await this.run('gh', args);
    if (result.exitCode !== 0) {
      throw new CommandFailedError('gh', args, result.exitCode, result.stderr);
    }
  }
}

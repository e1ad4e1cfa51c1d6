import { AuthFailedError, DependencyMissingError, type RemoteHost } from '@chunkstash/core';

/**
 * Fails fast when the remote host CLI is missing or not logged in.
 */
export async function ensureRemoteReady(remote: RemoteHost): Promise<void> {
  if (!(await remote.checkInstalled())) {
    throw new DependencyMissingError('gh', 'Install the GitHub CLI and make sure it is on PATH');
  }
  if (!(await remote.checkAuthenticated())) {
    throw new AuthFailedError();
  }
}

/**
 * Git repository detection for the pre-commit hook installer.
 */
import * as path from 'node:path';
import { isDirectory, isFile, readFile } from './file-system.js';

const GITDIR_PREFIX = 'gitdir:';

/**
 * Locate the git directory of a project.
 *
 * A `.git` directory is returned as-is. Worktrees and submodules have a `.git`
 * file instead, whose `gitdir: <path>` line points at the real git directory.
 *
 * @param projectRoot - Root directory of the project
 * @returns Absolute path of the git directory, or null if the project is not a repository
 */
export async function findGitDir(projectRoot: string): Promise<string | null> {
  const dotGit = path.join(projectRoot, '.git');

  if (await isDirectory(dotGit)) {
    return dotGit;
  }

  if (await isFile(dotGit)) {
    const content = await readFile(dotGit);
    const line = content
      .split('\n')
      .map(l => l.trim())
      .find(l => l.startsWith(GITDIR_PREFIX));
    if (!line) {
      return null;
    }
    const gitDir = path.resolve(projectRoot, line.slice(GITDIR_PREFIX.length).trim());
    return (await isDirectory(gitDir)) ? gitDir : null;
  }

  return null;
}

/**
 * Path of the git hooks directory for a git directory.
 */
export function gitHooksDir(gitDir: string): string {
  return path.join(gitDir, 'hooks');
}

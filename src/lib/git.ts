import { VmspaceError } from './errors'
import { type RunResult, run } from './vm/utils'

export interface GitIdentity {
  name: string
  email: string
}

export const FALLBACK_IDENTITY: GitIdentity = {
  name: 'vmspace',
  email: 'vmspace@localhost',
}

function git(
  repoDir: string,
  args: string[],
  env?: Record<string, string>,
): RunResult {
  return run('git', ['-C', repoDir, ...args], { env })
}

function read(repoDir: string, args: string[]): string | null {
  const result = git(repoDir, args)
  return result.ok ? result.stdout.trim() : null
}

export function isInsideGitRepo(dir: string = process.cwd()): boolean {
  return read(dir, ['rev-parse', '--is-inside-work-tree']) === 'true'
}

export function getRepoRoot(dir: string = process.cwd()): string {
  const root = read(dir, ['rev-parse', '--show-toplevel'])
  if (!root) {
    throw new VmspaceError(
      'NotAGitRepo',
      `${dir} is not inside a git repository.`,
      'Run the command from inside the repository you want to sync.',
    )
  }
  return root
}

/** Host identity, or the placeholder when either field is unset. */
export function getGitIdentity(dir: string = process.cwd()): GitIdentity {
  const name = read(dir, ['config', 'user.name'])
  const email = read(dir, ['config', 'user.email'])
  if (!name || !email) return FALLBACK_IDENTITY
  return { name, email }
}

export function hasCommits(repoDir: string): boolean {
  return read(repoDir, ['rev-parse', '--verify', '-q', 'HEAD']) !== null
}

export function branchExists(repoDir: string, branch: string): boolean {
  return (
    read(repoDir, ['rev-parse', '--verify', '-q', `refs/heads/${branch}`]) !==
    null
  )
}

export function revParse(repoDir: string, ref: string): string | null {
  return read(repoDir, ['rev-parse', '--verify', '-q', ref])
}

/** Branch checked out in the host working tree, null on a detached HEAD. */
export function currentBranch(repoDir: string): string | null {
  return read(repoDir, ['symbolic-ref', '--short', '-q', 'HEAD'])
}

export function createBranch(repoDir: string, branch: string): void {
  if (!hasCommits(repoDir)) {
    throw new VmspaceError(
      'SyncRejected',
      `Cannot create branch "${branch}": the repository has no commits yet.`,
      'Create an initial commit, then retry.',
    )
  }
  const result = git(repoDir, ['branch', branch])
  if (!result.ok) {
    throw new VmspaceError(
      'SyncRejected',
      `Failed to create branch "${branch}": ${result.stderr.trim()}`,
      'Check that the branch name is valid ("git check-ref-format --branch").',
    )
  }
}

export function getRemoteUrl(repoDir: string, remote: string): string | null {
  return read(repoDir, ['remote', 'get-url', remote])
}

/** Add the remote, or repoint it when the URL changed (e.g. after a VM rebuild). */
export function ensureRemote(repoDir: string, remote: string, url: string): void {
  const current = getRemoteUrl(repoDir, remote)
  if (current === url) return
  const args =
    current === null
      ? ['remote', 'add', remote, url]
      : ['remote', 'set-url', remote, url]
  const result = git(repoDir, args)
  if (!result.ok) {
    throw new VmspaceError(
      'SyncRejected',
      `Failed to configure remote "${remote}": ${result.stderr.trim()}`,
    )
  }
}

export function removeRemote(repoDir: string, remote: string): boolean {
  if (getRemoteUrl(repoDir, remote) === null) return false
  return git(repoDir, ['remote', 'remove', remote]).ok
}

export function listRemotes(repoDir: string): string[] {
  const output = read(repoDir, ['remote'])
  if (!output) return []
  return output.split('\n').filter(Boolean)
}

export function runGit(
  repoDir: string,
  args: string[],
  env?: Record<string, string>,
): RunResult {
  return git(repoDir, args, env)
}

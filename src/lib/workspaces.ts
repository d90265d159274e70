import { createHash } from 'node:crypto'
import path from 'node:path'
import * as debug from './debug'
import { type Warning, VmspaceError, warning } from './errors'
import * as git from './git'
import { execOrThrow, type RemoteShell } from './ssh'
import { shellEscape } from './vm/utils'

export const REMOTE_PREFIX = 'vmspace-'

export interface WorkspaceEntry {
  name: string
  lastModified: Date
}

export interface Workspace {
  name: string
  path: string
}

export interface EnsureResult extends Workspace {
  created: boolean
}

export interface CleanResult {
  removed: string[]
  warnings: Warning[]
}

function slug(value: string): string {
  return value
    .replace(/[^A-Za-z0-9._-]/g, '-')
    .replace(/\.{2,}/g, '.')
    .replace(/^[.-]+/, '')
}

/**
 * Stable directory name for a (repository, branch) pair. When either part had
 * to be rewritten, or contains the `--` separator, a short hash of the pair is
 * appended so distinct pairs never share a directory.
 */
export function workspaceName(repo: string, branch: string): string {
  const repoSlug = slug(repo) || 'repo'
  const branchSlug = slug(branch) || 'branch'
  const name = `${repoSlug}--${branchSlug}`
  const ambiguous =
    repoSlug !== repo ||
    branchSlug !== branch ||
    repo.includes('--') ||
    branch.includes('--')
  if (!ambiguous) return name
  const digest = createHash('sha1').update(`${repo}\0${branch}`).digest('hex')
  return `${name}-${digest.slice(0, 6)}`
}

export function isValidWorkspaceName(name: string): boolean {
  return /^[A-Za-z0-9_][A-Za-z0-9._-]*$/.test(name) && !name.includes('..')
}

export function remoteName(workspace: string): string {
  return `${REMOTE_PREFIX}${workspace}`
}

/** Parse `find -printf '%f\t%T@\n'` output. */
export function parseWorkspaceListing(output: string): WorkspaceEntry[] {
  const entries: WorkspaceEntry[] = []
  for (const line of output.split('\n')) {
    const [name, mtime] = line.split('\t')
    if (!name || !mtime) continue
    const seconds = Number(mtime)
    if (!Number.isFinite(seconds)) continue
    entries.push({ name, lastModified: new Date(seconds * 1000) })
  }
  return entries.sort((a, b) => a.name.localeCompare(b.name))
}

function ensureScript(dir: string, identity: git.GitIdentity): string {
  const target = shellEscape(dir)
  const create = [
    `mkdir -p ${target}`,
    `git init -q ${target}`,
    `git -C ${target} config user.name ${shellEscape(identity.name)}`,
    `git -C ${target} config user.email ${shellEscape(identity.email)}`,
    `git -C ${target} config receive.denyCurrentBranch updateInstead`,
    'echo created',
  ].join(' && ')
  return [
    `if [ -e ${target}/.git ]; then echo exists`,
    `elif [ -e ${target} ]; then echo corrupt`,
    `else ${create}`,
    'fi',
  ].join('; ')
}

type WorkspaceState = 'ok' | 'corrupt' | 'missing'

/** Where workspaces live, and the host repository they belong to, if any. */
export interface WorkspaceScope {
  shell: RemoteShell
  root: string
  repoDir?: string | null
}

export function workspacePath(scope: WorkspaceScope, name: string): string {
  return path.posix.join(scope.root, name)
}

export function listWorkspaces(scope: WorkspaceScope): WorkspaceEntry[] {
  const root = shellEscape(scope.root)
  const result = execOrThrow(
    scope.shell,
    `[ -d ${root} ] || exit 0; find ${root} -mindepth 1 -maxdepth 1 -type d -printf '%f\\t%T@\\n'`,
    { kind: 'Unreachable', message: 'Failed to list workspaces' },
  )
  return parseWorkspaceListing(result.stdout)
}

/**
 * Create the workspace clone for (repo, branch) if it is missing. A directory
 * without git metadata is reported, never repaired.
 */
export function ensureWorkspace(
  scope: WorkspaceScope,
  repo: string,
  branch: string,
): EnsureResult {
  const name = workspaceName(repo, branch)
  const dir = workspacePath(scope, name)
  const identity = scope.repoDir
    ? git.getGitIdentity(scope.repoDir)
    : git.FALLBACK_IDENTITY

  const result = execOrThrow(scope.shell, ensureScript(dir, identity), {
    kind: 'WorkspaceCorrupt',
    message: `Failed to prepare workspace ${name}`,
  })
  const state = result.stdout.trim().split('\n').pop()

  if (state === 'corrupt') {
    throw new VmspaceError(
      'WorkspaceCorrupt',
      `Workspace ${name} exists but is not a git repository.`,
      `Inspect ${dir} in the VM, then run "vmspace clean ${name}" to discard it.`,
    )
  }
  debug.log(`[workspaces] ${name}: ${state}`)
  return { name, path: dir, created: state === 'created' }
}

function workspaceState(scope: WorkspaceScope, name: string): WorkspaceState {
  if (!isValidWorkspaceName(name)) {
    throw new VmspaceError(
      'WorkspaceNotFound',
      `"${name}" is not a workspace name.`,
      'Run "vmspace list" to see existing workspaces.',
    )
  }
  const dir = shellEscape(workspacePath(scope, name))
  const result = execOrThrow(
    scope.shell,
    `if [ -e ${dir}/.git ]; then echo ok; elif [ -e ${dir} ]; then echo corrupt; else echo missing; fi`,
    { kind: 'Unreachable', message: `Failed to inspect workspace ${name}` },
  )
  const state = result.stdout.trim()
  if (state === 'ok' || state === 'corrupt') return state
  return 'missing'
}

function notFound(name: string): VmspaceError {
  return new VmspaceError(
    'WorkspaceNotFound',
    `Workspace ${name} does not exist.`,
    'Run "vmspace list" to see existing workspaces.',
  )
}

/** Resolve an existing workspace, failing if it is missing or corrupt. */
export function requireWorkspace(scope: WorkspaceScope, name: string): Workspace {
  const state = workspaceState(scope, name)
  if (state === 'missing') throw notFound(name)
  if (state === 'corrupt') {
    throw new VmspaceError(
      'WorkspaceCorrupt',
      `Workspace ${name} exists but is not a git repository.`,
      `Run "vmspace clean ${name}" to discard it.`,
    )
  }
  return { name, path: workspacePath(scope, name) }
}

/** Best-effort warning for uncommitted work; never blocks. */
export function dirtyWarning(scope: WorkspaceScope, name: string): Warning | null {
  const result = scope.shell.exec(
    `git -C ${shellEscape(workspacePath(scope, name))} status --porcelain`,
  )
  if (!result.ok) {
    debug.log(`[workspaces] dirty check failed for ${name}`)
    return null
  }
  const dirty = result.stdout.split('\n').filter((line) => line.trim() !== '')
  if (dirty.length === 0) return null
  return warning(
    'DirtyWorkingTree',
    `Workspace ${name} has ${dirty.length} uncommitted change(s).`,
  )
}

export function cleanWorkspace(scope: WorkspaceScope, name: string): CleanResult {
  const state = workspaceState(scope, name)
  if (state === 'missing') throw notFound(name)
  const target = workspacePath(scope, name)
  const dir = shellEscape(target)
  const warnings: Warning[] = []
  const dirty = state === 'ok' ? dirtyWarning(scope, name) : null
  if (dirty) {
    warnings.push(
      warning('DirtyWorkingTree', `${dirty.message} They are being discarded.`),
    )
  }

  execOrThrow(scope.shell, `rm -rf -- ${dir} && [ ! -e ${dir} ]`, {
    kind: 'WorkspaceCorrupt',
    message: `Failed to remove workspace ${name}`,
    recovery: `Check permissions on ${target} in the VM and retry.`,
  })

  // Host bookkeeping goes only after the guest directory is confirmed gone.
  if (scope.repoDir && git.removeRemote(scope.repoDir, remoteName(name))) {
    debug.log(`[workspaces] removed host remote ${remoteName(name)}`)
  }
  return { removed: [name], warnings }
}

export function cleanAllWorkspaces(scope: WorkspaceScope): CleanResult {
  const result: CleanResult = { removed: [], warnings: [] }
  for (const entry of listWorkspaces(scope)) {
    if (!isValidWorkspaceName(entry.name)) continue
    const cleaned = cleanWorkspace(scope, entry.name)
    result.removed.push(...cleaned.removed)
    result.warnings.push(...cleaned.warnings)
  }
  return result
}

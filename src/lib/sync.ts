import * as debug from './debug'
import { outputTail, type Warning, VmspaceError, warning } from './errors'
import * as git from './git'
import { execOrThrow, type RemoteShell } from './ssh'
import { shellEscape } from './vm/utils'
import { remoteName, type Workspace } from './workspaces'

export interface PushResult {
  branchCreated: boolean
  commit: string | null
}

export interface FetchResult {
  commit: string | null
  /** True when the host working tree moved along with the ref. */
  updatedWorkingTree: boolean
  warnings: Warning[]
}

function isRejection(output: string): boolean {
  return /non-fast-forward|\[rejected\]|fetch first|diverg|Not possible to fast-forward/i.test(
    output,
  )
}

function prepareRemote(
  shell: RemoteShell,
  repoDir: string,
  workspace: Workspace,
): string {
  const remote = remoteName(workspace.name)
  git.ensureRemote(repoDir, remote, shell.gitUrl(workspace.path))
  return remote
}

export function workspaceHasBranch(
  shell: RemoteShell,
  workspace: Workspace,
  branch: string,
): boolean {
  const ref = shellEscape(`refs/heads/${branch}`)
  return shell.exec(
    `git -C ${shellEscape(workspace.path)} rev-parse --verify -q ${ref}`,
  ).ok
}

/**
 * Send a host branch to a workspace clone and check it out there. The push is
 * never forced; guest commits the host lacks make it fail with SyncRejected.
 */
export function pushBranch(
  shell: RemoteShell,
  repoDir: string,
  branch: string,
  workspace: Workspace,
): PushResult {
  let branchCreated = false
  if (!git.branchExists(repoDir, branch)) {
    git.createBranch(repoDir, branch)
    branchCreated = true
    debug.log(`[sync] created host branch ${branch} from HEAD`)
  }

  const remote = prepareRemote(shell, repoDir, workspace)
  const ref = `refs/heads/${branch}`
  const result = git.runGit(
    repoDir,
    ['push', '--porcelain', remote, `${ref}:${ref}`],
    shell.gitEnv(),
  )
  if (!result.ok) {
    const output = `${result.stdout}\n${result.stderr}`
    throw new VmspaceError(
      'SyncRejected',
      isRejection(output)
        ? `Push of ${branch} to ${workspace.name} was rejected: the workspace has commits the host does not.`
        : `Push of ${branch} to ${workspace.name} failed.\n${outputTail(result.stderr || result.stdout)}`,
      isRejection(output)
        ? `Run "vmspace fetch ${branch}", reconcile the histories, then push again.`
        : 'Commit or discard uncommitted changes in the workspace, then push again.',
    )
  }

  execOrThrow(
    shell,
    `git -C ${shellEscape(workspace.path)} checkout -q ${shellEscape(branch)}`,
    {
      kind: 'SyncRejected',
      message: `Pushed ${branch}, but checking it out in ${workspace.name} failed`,
      recovery: `Commit or stash the workspace's changes, then run "vmspace push ${branch}" again.`,
    },
  )

  return { branchCreated, commit: git.revParse(repoDir, ref) }
}

/**
 * Bring a workspace branch back into the host repository, fast-forward only.
 * Uncommitted guest changes are reported first and left behind.
 */
export function fetchBranch(
  shell: RemoteShell,
  repoDir: string,
  branch: string,
  workspace: Workspace,
): FetchResult {
  const warnings: Warning[] = []
  const dir = shellEscape(workspace.path)

  const status = execOrThrow(shell, `git -C ${dir} status --porcelain`, {
    kind: 'WorkspaceCorrupt',
    message: `Failed to read the status of ${workspace.name}`,
  })
  const dirty = status.stdout.split('\n').filter((line) => line.trim() !== '')
  if (dirty.length > 0) {
    warnings.push(
      warning(
        'DirtyWorkingTree',
        `Workspace ${workspace.name} has ${dirty.length} uncommitted change(s); they are not part of this fetch. Commit them inside the VM and fetch again.`,
      ),
    )
  }

  if (!workspaceHasBranch(shell, workspace, branch)) {
    throw new VmspaceError(
      'SyncRejected',
      `Branch ${branch} does not exist in workspace ${workspace.name}.`,
      `Run "vmspace push ${branch}" first.`,
    )
  }

  const ref = `refs/heads/${branch}`
  const remote = prepareRemote(shell, repoDir, workspace)
  const checkedOut = git.currentBranch(repoDir) === branch
  const args = checkedOut
    ? ['pull', '--ff-only', '--quiet', remote, branch]
    : ['fetch', '--quiet', remote, `${ref}:${ref}`]
  const result = git.runGit(repoDir, args, shell.gitEnv())
  if (!result.ok) {
    const output = `${result.stdout}\n${result.stderr}`
    throw new VmspaceError(
      'SyncRejected',
      isRejection(output)
        ? `Fetch of ${branch} from ${workspace.name} was rejected: host and workspace histories have diverged.`
        : `Fetch of ${branch} from ${workspace.name} failed.\n${outputTail(result.stderr || result.stdout)}`,
      isRejection(output)
        ? `Merge or rebase with "git pull ${remote} ${branch}" on the host.`
        : 'Commit or stash host changes that would be overwritten, then fetch again.',
    )
  }

  return {
    commit: git.revParse(repoDir, ref),
    updatedWorkingTree: checkedOut,
    warnings,
  }
}

import path from 'node:path'
import { loadConfig } from './config'
import { resolveCredentials } from './credentials'
import * as debug from './debug'
import { type Warning, VmspaceError, errorMessage } from './errors'
import * as git from './git'
import { type MountBinding, MountManager } from './mount'
import { SshShell } from './ssh'
import { fetchBranch, pushBranch, workspaceHasBranch } from './sync'
import * as ui from './ui'
import {
  destroyVm,
  ensureVmRunning,
  formatResources,
  type RunningVm,
  requireVm,
  type VmContext,
  vmStatus,
} from './vm'
import { getMountDir } from './vm/paths'
import { detectNetworkSubnet } from './vm/provision'
import { TerraformBackend } from './vm/terraform'
import type { ResourceSpec } from './vm/types'
import {
  cleanAllWorkspaces,
  cleanWorkspace,
  dirtyWarning,
  ensureWorkspace,
  listWorkspaces,
  requireWorkspace,
  type WorkspaceScope,
  workspaceName,
} from './workspaces'

export interface ProvisionOptions {
  overrides: Partial<ResourceSpec>
  credentialsPath?: string
}

export type Intent =
  | ({
      kind: 'connect'
      cwd: string
      branch: string | null
      root: boolean
      command: string[]
    } & ProvisionOptions)
  | ({ kind: 'push'; cwd: string; branch: string } & ProvisionOptions)
  | { kind: 'fetch'; cwd: string; branch: string; unmount: boolean }
  | { kind: 'list' }
  | { kind: 'clean'; cwd: string; name: string }
  | { kind: 'clean-all'; cwd: string }
  | { kind: 'destroy' }
  | { kind: 'status' }

type IntentOf<K extends Intent['kind']> = Extract<Intent, { kind: K }>

function formatAge(date: Date, now: Date): string {
  const seconds = Math.max(0, Math.floor((now.getTime() - date.getTime()) / 1000))
  if (seconds < 60) return `${seconds}s ago`
  if (seconds < 3600) return `${Math.floor(seconds / 60)}m ago`
  if (seconds < 86400) return `${Math.floor(seconds / 3600)}h ago`
  return `${Math.floor(seconds / 86400)}d ago`
}

function repoRootOrNull(cwd: string): string | null {
  return git.isInsideGitRepo(cwd) ? git.getRepoRoot(cwd) : null
}

export interface OrchestratorContext {
  vm: VmContext
  mounts: MountBinding
  /** Every warning reported during this invocation, in order. */
  warnings: Warning[]
}

function scope(vm: RunningVm, repoDir: string | null = null): WorkspaceScope {
  return { shell: vm.shell, root: vm.endpoint.workspaceRoot, repoDir }
}

function warn(ctx: OrchestratorContext, warnings: Warning[]): void {
  for (const entry of warnings) {
    ctx.warnings.push(entry)
    debug.log(`[warning] ${entry.kind}: ${entry.message}`)
    ui.warn(entry.message)
  }
}

function connect(ctx: OrchestratorContext, intent: IntentOf<'connect'>): number {
  ui.intro()
  const repoDir = repoRootOrNull(intent.cwd)
  const vm = ensureVmRunning(ctx.vm, intent)
  warn(ctx, vm.warnings)
  if (vm.created) {
    ui.success(`Created VM at ${vm.endpoint.host}`)
  }

  let cwd = vm.endpoint.workspaceRoot
  if (repoDir) {
    const branch = intent.branch ?? git.currentBranch(repoDir)
    if (!branch) {
      throw new VmspaceError(
        'InvalidConfig',
        'HEAD is detached, so there is no branch to connect to.',
        'Pass a branch name: vmspace connect <branch>.',
      )
    }
    const workspace = ensureWorkspace(
      scope(vm, repoDir),
      path.basename(repoDir),
      branch,
    )
    // A clone left empty by an earlier failed population is filled in too.
    if (workspace.created || !workspaceHasBranch(vm.shell, workspace, branch)) {
      pushBranch(vm.shell, repoDir, branch, workspace)
      ui.success(
        `${workspace.created ? 'Created' : 'Populated'} workspace ${workspace.name} from ${branch}`,
      )
    }
    cwd = workspace.path
  } else if (intent.branch) {
    ui.warn(
      `Not inside a git repository; ignoring "${intent.branch}" and opening the workspace root.`,
    )
  }

  warn(ctx, ctx.mounts.ensureMounted(vm.endpoint))
  ui.outro(`Connecting to ${cwd}...`)
  return vm.shell.session({
    cwd,
    command: intent.command,
    root: intent.root,
  })
}

function push(ctx: OrchestratorContext, intent: IntentOf<'push'>): number {
  const repoDir = git.getRepoRoot(intent.cwd)
  const vm = ensureVmRunning(ctx.vm, intent)
  warn(ctx, vm.warnings)

  const workspace = ensureWorkspace(
    scope(vm, repoDir),
    path.basename(repoDir),
    intent.branch,
  )
  const result = pushBranch(vm.shell, repoDir, intent.branch, workspace)
  if (result.branchCreated) {
    ui.info(`Created branch ${intent.branch} from HEAD`)
  }
  ui.success(
    `Pushed ${intent.branch} to ${workspace.name}${result.commit ? ` (${result.commit.slice(0, 7)})` : ''}`,
  )
  return 0
}

function fetch(ctx: OrchestratorContext, intent: IntentOf<'fetch'>): number {
  const repoDir = git.getRepoRoot(intent.cwd)
  const vm = requireVm(ctx.vm)
  warn(ctx, vm.warnings)

  const workspace = requireWorkspace(
    scope(vm, repoDir),
    workspaceName(path.basename(repoDir), intent.branch),
  )
  const result = fetchBranch(vm.shell, repoDir, intent.branch, workspace)
  // Reported before any unmount below.
  warn(ctx, result.warnings)
  ui.success(
    `Fetched ${intent.branch} from ${workspace.name}${result.updatedWorkingTree ? ' and updated the working tree' : ''}`,
  )

  if (intent.unmount && ctx.mounts.unmount()) {
    ui.info(`Unmounted ${ctx.mounts.mountDir}`)
  }
  return 0
}

function list(ctx: OrchestratorContext): number {
  const status = vmStatus(ctx.vm)
  if (status.state !== 'running' || !status.endpoint) {
    ui.info(
      status.state === 'absent'
        ? 'No VM exists. Run "vmspace connect" to create one.'
        : 'The VM is stopped. Run "vmspace connect" to start it.',
    )
    return 0
  }

  const vm = ensureVmRunning(ctx.vm)
  try {
    const entries = listWorkspaces(scope(vm))
    if (entries.length === 0) {
      ui.info('No workspaces yet.')
    }
    const now = new Date()
    for (const entry of entries) {
      ui.info(`${entry.name}  ${ui.colors.dim(formatAge(entry.lastModified, now))}`)
    }
  } catch (err) {
    ui.warn(`Could not list workspaces: ${errorMessage(err)}`)
  }

  const mounted = ctx.mounts.current()
  ui.info(
    mounted ? `Mounted at ${ctx.mounts.mountDir}` : 'Workspaces are not mounted.',
  )
  return 0
}

function clean(ctx: OrchestratorContext, intent: IntentOf<'clean'>): number {
  const vm = requireVm(ctx.vm)
  warn(ctx, vm.warnings)
  const result = cleanWorkspace(scope(vm, repoRootOrNull(intent.cwd)), intent.name)
  warn(ctx, result.warnings)
  ui.success(`Removed workspace ${intent.name}`)
  return 0
}

function cleanAll(ctx: OrchestratorContext, intent: IntentOf<'clean-all'>): number {
  const vm = requireVm(ctx.vm)
  warn(ctx, vm.warnings)
  const result = cleanAllWorkspaces(scope(vm, repoRootOrNull(intent.cwd)))
  warn(ctx, result.warnings)
  if (result.removed.length === 0) {
    ui.info('No workspaces to remove.')
  } else {
    ui.success(`Removed ${result.removed.length} workspace(s)`)
  }
  return 0
}

function destroy(ctx: OrchestratorContext): number {
  const status = vmStatus(ctx.vm)
  // Dirty check runs before unmount and destroy.
  if (status.state === 'running' && status.endpoint) {
    try {
      const workspaces = scope(ensureVmRunning(ctx.vm))
      for (const entry of listWorkspaces(workspaces)) {
        const dirty = dirtyWarning(workspaces, entry.name)
        if (dirty) {
          warn(ctx, [
            { kind: dirty.kind, message: `${dirty.message} They are lost with the VM.` },
          ])
        }
      }
    } catch (err) {
      debug.log(`[orchestrator] pre-destroy dirty check failed: ${errorMessage(err)}`)
    }
  }

  if (destroyVm(ctx.vm)) {
    ui.success('Destroyed the VM')
  } else {
    ui.info('No VM to destroy.')
  }
  return 0
}

function status(ctx: OrchestratorContext): number {
  const current = vmStatus(ctx.vm)
  ui.info(`VM: ${current.state}`)
  if (current.endpoint) {
    ui.info(`Address: ${current.endpoint.user}@${current.endpoint.host}`)
    ui.info(`Workspace root: ${current.endpoint.workspaceRoot}`)
  }
  if (current.resources) {
    ui.info(`Resources: ${formatResources(current.resources)}`)
  }
  const mounted = ctx.mounts.current()
  ui.info(
    mounted
      ? `Mount: ${ctx.mounts.mountDir} -> ${mounted}`
      : `Mount: not mounted (${ctx.mounts.mountDir})`,
  )
  return 0
}

/** Wire the production collaborators from the environment. */
export function createContext(env = process.env): OrchestratorContext {
  const config = loadConfig(env)
  const mounts = new MountManager(getMountDir())
  return {
    vm: {
      backend: new TerraformBackend(),
      config,
      mounts,
      connect: (endpoint) => new SshShell(endpoint, config.sshTimeoutMs),
      resolveCredentials: (explicitPath) =>
        resolveCredentials({
          explicitPath,
          envPath: config.credentialsEnvPath,
          vertexProjectId: config.vertexProjectId,
          vertexRegion: config.vertexRegion,
        }),
      detectSubnet: () => detectNetworkSubnet(),
    },
    mounts,
    warnings: [],
  }
}

/** Run one intent to completion and return the process exit code. */
export function dispatch(
  intent: Intent,
  ctx: OrchestratorContext = createContext(),
): number {
  debug.log(`[orchestrator] dispatch ${intent.kind}`)
  switch (intent.kind) {
    case 'connect':
      return connect(ctx, intent)
    case 'push':
      return push(ctx, intent)
    case 'fetch':
      return fetch(ctx, intent)
    case 'list':
      return list(ctx)
    case 'clean':
      return clean(ctx, intent)
    case 'clean-all':
      return cleanAll(ctx, intent)
    case 'destroy':
      return destroy(ctx)
    case 'status':
      return status(ctx)
  }
}

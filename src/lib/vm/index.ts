import type { Config } from '../config'
import type { CredentialMaterial } from '../credentials'
import { deliverCredentials } from '../credentials'
import * as debug from '../debug'
import { type Warning, VmspaceError, warning } from '../errors'
import type { MountBinding } from '../mount'
import type { RemoteShell } from '../ssh'
import type {
  ApplyRequest,
  Endpoint,
  ProvisioningBackend,
  ResourceSpec,
  VmStatus,
} from './types'
import { sleep as blockingSleep } from './utils'

export type { Endpoint, ResourceSpec, VmLifecycle, VmStatus } from './types'

const PROBE_CONNECT_TIMEOUT_SEC = 5
const UNASSIGNED_IP = 'IP not yet assigned'

/** Collaborators of the VM lifecycle functions. */
export interface VmContext {
  backend: ProvisioningBackend
  config: Config
  mounts: MountBinding
  connect: (endpoint: Endpoint) => RemoteShell
  resolveCredentials: (explicitPath?: string) => CredentialMaterial | null
  detectSubnet: () => number
  sleep?: (ms: number) => void
}

export interface EnsureOptions {
  overrides?: Partial<ResourceSpec>
  credentialsPath?: string
}

export interface RunningVm {
  endpoint: Endpoint
  shell: RemoteShell
  created: boolean
  warnings: Warning[]
}

function stringOutput(value: unknown): string | null {
  return typeof value === 'string' && value !== '' ? value : null
}

function numberOutput(value: unknown): number | null {
  const parsed = typeof value === 'string' ? Number(value) : value
  return typeof parsed === 'number' && Number.isInteger(parsed) ? parsed : null
}

export function endpointFromOutputs(
  outputs: Record<string, unknown>,
): Endpoint | null {
  const host = stringOutput(outputs.vm_ip)
  const user = stringOutput(outputs.default_user)
  const keyPath = stringOutput(outputs.ssh_key_path)
  const workspaceRoot = stringOutput(outputs.workspace_root)
  if (!host || host === UNASSIGNED_IP || !user || !keyPath || !workspaceRoot) {
    return null
  }
  return { host, user, keyPath, workspaceRoot }
}

export function resourcesFromOutputs(
  outputs: Record<string, unknown>,
): ResourceSpec | null {
  const memoryMb = numberOutput(outputs.memory_mb)
  const vcpus = numberOutput(outputs.vcpus)
  const diskGb = numberOutput(outputs.disk_gb)
  if (memoryMb === null || vcpus === null || diskGb === null) return null
  return { memoryMb, vcpus, diskGb }
}

export function formatResources(resources: ResourceSpec): string {
  return `${resources.memoryMb} MiB memory, ${resources.vcpus} vCPU(s), ${resources.diskGb} GiB disk`
}

const OVERRIDE_FLAGS: Record<keyof ResourceSpec, string> = {
  memoryMb: '--memory',
  vcpus: '--cpus',
  diskGb: '--disk',
}

/** Override keys that differ from what the VM was created with. */
export function ignoredOverrides(
  overrides: Partial<ResourceSpec>,
  recorded: ResourceSpec | null,
): (keyof ResourceSpec)[] {
  const keys: (keyof ResourceSpec)[] = ['memoryMb', 'vcpus', 'diskGb']
  return keys.filter((key) => {
    const requested = overrides[key]
    if (requested === undefined) return false
    return recorded === null || recorded[key] !== requested
  })
}

export function vmStatus(ctx: VmContext): VmStatus {
  const state = ctx.backend.inspect()
  if (state === 'absent') {
    return { state, endpoint: null, resources: null }
  }
  const outputs = ctx.backend.outputs()
  return {
    state,
    endpoint: endpointFromOutputs(outputs),
    resources: resourcesFromOutputs(outputs),
  }
}

/**
 * Make sure the singleton VM is up. Every call re-reads the backend's state;
 * a running VM with an address costs no provisioning call.
 */
export function ensureVmRunning(
  ctx: VmContext,
  options: EnsureOptions = {},
): RunningVm {
  const overrides = options.overrides ?? {}
  const state = ctx.backend.inspect()
  debug.log(`[vm] state before ensure: ${state}`)

  if (state === 'absent') {
    return createVm(ctx, overrides, options.credentialsPath)
  }

  const warnings: Warning[] = []
  const outputs = ctx.backend.outputs()
  const recorded = resourcesFromOutputs(outputs)
  const ignored = ignoredOverrides(overrides, recorded)
  if (ignored.length > 0) {
    const current = recorded ? formatResources(recorded) : 'its original resources'
    const flags = ignored.map((key) => OVERRIDE_FLAGS[key]).join(', ')
    warnings.push(
      warning(
        'ResourceOverrideIgnored',
        `The VM already exists with ${current}; ignoring ${flags}. Run "vmspace destroy" and connect again to resize.`,
      ),
    )
  }

  const endpoint = endpointFromOutputs(outputs)
  if (state === 'running' && endpoint) {
    return { endpoint, shell: ctx.connect(endpoint), created: false, warnings }
  }

  // Re-applying the recorded values starts the domain without resizing it.
  const subnet = numberOutput(outputs.network_subnet_third_octet)
  ctx.backend.apply({
    resources: recorded ?? ctx.config.resources,
    networkSubnet: subnet ?? networkSubnet(ctx),
    credentials: null,
  })
  const started = requireEndpoint(ctx)
  const shell = ctx.connect(started)
  waitForReachable(ctx, shell)
  return { endpoint: started, shell, created: false, warnings }
}

/** Bring up a VM that already exists; never creates one. */
export function requireVm(ctx: VmContext): RunningVm {
  if (ctx.backend.inspect() === 'absent') {
    throw new VmspaceError(
      'VmAbsent',
      'No VM exists yet.',
      'Run "vmspace connect" or "vmspace push <branch>" to create it.',
    )
  }
  return ensureVmRunning(ctx)
}

/** Unmount, then destroy. Success is only reported once the backend confirms. */
export function destroyVm(ctx: VmContext): boolean {
  ctx.mounts.unmount()

  if (!ctx.backend.hasResources()) {
    debug.log('[vm] nothing recorded in the state store, nothing to destroy')
    return false
  }

  ctx.backend.destroy()
  const after = ctx.backend.inspect()
  if (after !== 'absent' || ctx.backend.hasResources()) {
    throw new VmspaceError(
      'ProvisioningFailed',
      `Destroy finished, but ${ctx.backend.describe()} still records resources.`,
      `Inspect ${ctx.backend.describe()}, remove leftovers by hand, then run "vmspace destroy" again.`,
    )
  }
  return true
}

function networkSubnet(ctx: VmContext): number {
  return ctx.config.networkSubnet ?? ctx.detectSubnet()
}

function createVm(
  ctx: VmContext,
  overrides: Partial<ResourceSpec>,
  credentialsPath: string | undefined,
): RunningVm {
  const warnings: Warning[] = []
  let request: ApplyRequest = {
    resources: { ...ctx.config.resources, ...overrides },
    networkSubnet: networkSubnet(ctx),
    credentials: null,
  }

  const material = ctx.resolveCredentials(credentialsPath)
  if (material) {
    request = deliverCredentials(material, request)
  } else {
    warnings.push(
      warning(
        'CredentialsNotFound',
        'No credentials file found; the VM is created without cloud credentials.',
      ),
    )
  }

  debug.log(`[vm] creating VM with ${formatResources(request.resources)}`)
  ctx.backend.apply(request)

  const endpoint = requireEndpoint(ctx)
  const shell = ctx.connect(endpoint)
  waitForReachable(ctx, shell)

  const cloudInit = shell.exec('cloud-init status --wait', {
    timeoutMs: ctx.config.bootTimeoutMs,
  })
  if (!cloudInit.ok) {
    warnings.push(
      warning(
        'ProvisioningIncomplete',
        `First-boot setup did not finish cleanly (cloud-init exit ${cloudInit.status}). Check /var/log/cloud-init-output.log in the VM.`,
      ),
    )
  }

  return { endpoint, shell, created: true, warnings }
}

function requireEndpoint(ctx: VmContext): Endpoint {
  const endpoint = endpointFromOutputs(ctx.backend.outputs())
  if (!endpoint) {
    throw new VmspaceError(
      'ProvisioningFailed',
      'The VM was applied but reported no reachable address.',
      `Inspect ${ctx.backend.describe()} ("terraform output"), or run "vmspace destroy" and retry.`,
    )
  }
  return endpoint
}

/**
 * Poll until the guest accepts a connection. Each phase lasts at most
 * bootTimeoutMs; only this wait is retried, bootRetries times.
 */
function waitForReachable(ctx: VmContext, shell: RemoteShell): void {
  const { bootTimeoutMs, bootPollIntervalMs, bootRetries } = ctx.config
  const sleep = ctx.sleep ?? blockingSleep
  for (let phase = 0; phase <= bootRetries; phase++) {
    let elapsed = 0
    while (true) {
      if (shell.probe(PROBE_CONNECT_TIMEOUT_SEC)) return
      if (elapsed >= bootTimeoutMs) break
      sleep(bootPollIntervalMs)
      elapsed += bootPollIntervalMs
    }
    debug.log(`[vm] boot wait phase ${phase + 1} timed out`)
  }
  throw new VmspaceError(
    'Unreachable',
    `The VM did not accept connections within ${bootRetries + 1} x ${Math.round(bootTimeoutMs / 1000)}s.`,
    'Check "virsh console vmspace" for boot errors, or run "vmspace destroy" and retry.',
  )
}

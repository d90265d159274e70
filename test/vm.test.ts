import fs from 'node:fs'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import type { CredentialMaterial } from '../src/lib/credentials'
import { isVmspaceError } from '../src/lib/errors'
import {
  destroyVm,
  endpointFromOutputs,
  ensureVmRunning,
  ignoredOverrides,
  requireVm,
  resourcesFromOutputs,
  type VmContext,
  vmStatus,
} from '../src/lib/vm'
import {
  FakeBackend,
  FakeMounts,
  ScriptedShell,
  testConfig,
} from './helpers/fakes'
import { makeTempDir } from './helpers/git'

function setup(options: {
  probes?: boolean[]
  fallback?: boolean
  credentials?: CredentialMaterial | null
} = {}) {
  const events: string[] = []
  const backend = new FakeBackend('/home/dev/workspace', events)
  const mounts = new FakeMounts(events)
  const shell = new ScriptedShell(options.probes, options.fallback ?? true)
  const resolveCredentials = vi.fn(
    (_explicitPath?: string) => options.credentials ?? null,
  )
  const sleep = vi.fn()
  const ctx: VmContext = {
    backend,
    config: testConfig(),
    mounts,
    connect: () => shell,
    resolveCredentials,
    detectSubnet: () => 150,
    sleep,
  }
  return { events, backend, mounts, shell, resolveCredentials, sleep, ctx }
}

describe('ensureVmRunning', () => {
  it('creates the VM when absent and waits for first boot', () => {
    const { backend, shell, ctx } = setup()

    const vm = ensureVmRunning(ctx)

    expect(vm.created).toBe(true)
    expect(vm.endpoint).toEqual({
      host: '192.168.123.10',
      user: 'dev',
      keyPath: '/tmp/vm-ssh-key',
      workspaceRoot: '/home/dev/workspace',
    })
    expect(backend.applies).toEqual([
      {
        resources: { memoryMb: 4096, vcpus: 2, diskGb: 20 },
        networkSubnet: 150,
        credentials: null,
      },
    ])
    expect(shell.commands).toEqual(['cloud-init status --wait'])
  })

  it('performs no provisioning call when the VM is already running', () => {
    const { backend, ctx } = setup()
    ensureVmRunning(ctx)

    const second = ensureVmRunning(ctx)

    expect(second.created).toBe(false)
    expect(second.warnings).toEqual([])
    expect(backend.applies).toHaveLength(1)
  })

  it('applies creation-time overrides', () => {
    const { backend, ctx } = setup()

    ensureVmRunning(ctx, { overrides: { memoryMb: 8192, diskGb: 40 } })

    expect(backend.applies[0].resources).toEqual({
      memoryMb: 8192,
      vcpus: 2,
      diskGb: 40,
    })
  })

  it('ignores resource overrides against a running VM with a warning', () => {
    const { backend, ctx } = setup()
    ensureVmRunning(ctx)

    const vm = ensureVmRunning(ctx, {
      overrides: { memoryMb: 8192, vcpus: 2 },
    })

    expect(backend.applies).toHaveLength(1)
    expect(vm.warnings).toEqual([
      {
        kind: 'ResourceOverrideIgnored',
        message:
          'The VM already exists with 4096 MiB memory, 2 vCPU(s), 20 GiB disk; ignoring --memory. Run "vmspace destroy" and connect again to resize.',
      },
    ])
    expect(vmStatus(ctx).resources).toEqual({
      memoryMb: 4096,
      vcpus: 2,
      diskGb: 20,
    })
  })

  it('names every ignored override by its flag', () => {
    const { ctx } = setup()
    ensureVmRunning(ctx)

    const vm = ensureVmRunning(ctx, { overrides: { vcpus: 4, diskGb: 50 } })

    expect(vm.warnings.map((entry) => entry.message)).toEqual([
      'The VM already exists with 4096 MiB memory, 2 vCPU(s), 20 GiB disk; ignoring --cpus, --disk. Run "vmspace destroy" and connect again to resize.',
    ])
  })

  it('restarts a stopped VM with its recorded resources', () => {
    const { backend, ctx } = setup()
    ensureVmRunning(ctx)
    backend.state = 'stopped'

    const vm = ensureVmRunning(ctx, { overrides: { vcpus: 8 } })

    expect(vm.created).toBe(false)
    expect(vm.warnings.map((entry) => entry.kind)).toEqual([
      'ResourceOverrideIgnored',
    ])
    expect(backend.applies[1]).toEqual({
      resources: { memoryMb: 4096, vcpus: 2, diskGb: 20 },
      networkSubnet: 150,
      credentials: null,
    })
    expect(vmStatus(ctx).state).toBe('running')
  })

  it('surfaces apply failures verbatim without retrying', () => {
    const { backend, ctx } = setup()
    backend.failApply = true

    expect(() => ensureVmRunning(ctx)).toThrow(
      'apply failed: quota exceeded',
    )
    expect(backend.applies).toHaveLength(1)
  })

  it('retries only the reachability wait, a bounded number of times', () => {
    const { backend, shell, sleep, ctx } = setup({ fallback: false })

    let caught: unknown
    try {
      ensureVmRunning(ctx)
    } catch (err) {
      caught = err
    }

    expect(isVmspaceError(caught, 'Unreachable')).toBe(true)
    // 3 phases, each probing at 0, 5 and 10 ms.
    expect(shell.probeCalls).toBe(9)
    expect(sleep).toHaveBeenCalledTimes(6)
    expect(sleep).toHaveBeenCalledWith(5)
    expect(backend.applies).toHaveLength(1)
  })

  it('returns once the guest answers', () => {
    const { shell, sleep, ctx } = setup({ probes: [false, false, true] })

    ensureVmRunning(ctx)

    expect(shell.probeCalls).toBe(3)
    expect(sleep).toHaveBeenCalledTimes(2)
  })

  it('warns when first-boot setup reports an error', () => {
    const { shell, ctx } = setup()
    shell.execResult = {
      ok: false,
      status: 2,
      stdout: '',
      stderr: '',
      timedOut: false,
    }

    const vm = ensureVmRunning(ctx)

    expect(
      vm.warnings.filter((entry) => entry.kind === 'ProvisioningIncomplete'),
    ).toEqual([
      {
        kind: 'ProvisioningIncomplete',
        message:
          'First-boot setup did not finish cleanly (cloud-init exit 2). Check /var/log/cloud-init-output.log in the VM.',
      },
    ])
  })
})

describe('VM credentials', () => {
  let dir = ''

  beforeEach(() => {
    dir = makeTempDir('creds')
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('delivers credentials only when the VM is created', () => {
    const file = path.join(dir, 'adc.json')
    fs.writeFileSync(file, 'test-secret')
    const { backend, resolveCredentials, ctx } = setup({
      credentials: {
        source: 'explicit',
        path: file,
        vertexProjectId: 'test-project',
        vertexRegion: 'us-central1',
      },
    })

    ensureVmRunning(ctx, { credentialsPath: file })
    backend.state = 'stopped'
    ensureVmRunning(ctx, { credentialsPath: file })

    expect(resolveCredentials).toHaveBeenCalledTimes(1)
    expect(resolveCredentials).toHaveBeenCalledWith(file)
    expect(backend.applies[0].credentials).toEqual({
      base64: Buffer.from('test-secret').toString('base64'),
      vertexProjectId: 'test-project',
      vertexRegion: 'us-central1',
    })
    expect(backend.applies[1].credentials).toBeNull()
  })

  it('warns when no credentials are found', () => {
    const { ctx } = setup()

    const vm = ensureVmRunning(ctx)

    expect(vm.warnings).toEqual([
      {
        kind: 'CredentialsNotFound',
        message:
          'No credentials file found; the VM is created without cloud credentials.',
      },
    ])
  })
})

describe('destroyVm', () => {
  it('unmounts before destroying and reports absent afterwards', () => {
    const { events, ctx } = setup()
    ensureVmRunning(ctx)
    events.length = 0

    expect(destroyVm(ctx)).toBe(true)

    expect(events).toEqual(['unmount', 'destroy'])
    expect(vmStatus(ctx)).toEqual({
      state: 'absent',
      endpoint: null,
      resources: null,
    })
  })

  it('never reports absent when the backend destroy fails', () => {
    const { backend, ctx } = setup()
    ensureVmRunning(ctx)
    backend.failDestroy = true

    expect(() => destroyVm(ctx)).toThrow('destroy failed: domain busy')
    expect(vmStatus(ctx).state).not.toBe('absent')
  })

  it('does nothing when no resources are recorded', () => {
    const { backend, events, ctx } = setup()

    expect(destroyVm(ctx)).toBe(false)
    expect(backend.destroyCalls).toBe(0)
    expect(events).toEqual(['unmount'])
  })
})

describe('requireVm', () => {
  it('refuses to create a VM', () => {
    const { backend, ctx } = setup()

    let caught: unknown
    try {
      requireVm(ctx)
    } catch (err) {
      caught = err
    }

    expect(isVmspaceError(caught, 'VmAbsent')).toBe(true)
    expect(backend.applies).toHaveLength(0)
  })
})

describe('output parsing', () => {
  it('treats an unassigned address as no endpoint', () => {
    expect(
      endpointFromOutputs({
        vm_ip: 'IP not yet assigned',
        default_user: 'dev',
        ssh_key_path: '/tmp/key',
        workspace_root: '/home/dev/workspace',
      }),
    ).toBeNull()
  })

  it('accepts numeric strings for resources', () => {
    expect(
      resourcesFromOutputs({ memory_mb: '2048', vcpus: 4, disk_gb: '30' }),
    ).toEqual({ memoryMb: 2048, vcpus: 4, diskGb: 30 })
    expect(resourcesFromOutputs({ memory_mb: 2048, vcpus: 4 })).toBeNull()
  })

  it('lists only overrides that differ from the recorded resources', () => {
    const recorded = { memoryMb: 4096, vcpus: 2, diskGb: 20 }
    expect(ignoredOverrides({ memoryMb: 4096, vcpus: 4 }, recorded)).toEqual([
      'vcpus',
    ])
    expect(ignoredOverrides({ diskGb: 20 }, null)).toEqual(['diskGb'])
  })
})

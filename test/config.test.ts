import { describe, expect, it } from 'vitest'
import { loadConfig, parseResourceOverrides } from '../src/lib/config'
import { isVmspaceError } from '../src/lib/errors'

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      resources: { memoryMb: 4096, vcpus: 2, diskGb: 20 },
      sshTimeoutMs: 30000,
      bootTimeoutMs: 120000,
      bootRetries: 2,
      bootPollIntervalMs: 5000,
      networkSubnet: null,
      credentialsEnvPath: null,
      vertexProjectId: null,
      vertexRegion: 'us-central1',
    })
  })

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      VMSPACE_VM_MEMORY_MB: '8192',
      VMSPACE_VM_CPUS: '4',
      VMSPACE_SSH_TIMEOUT_SEC: '5',
      NETWORK_SUBNET: '77',
      GCP_CREDENTIALS_PATH: '/tmp/creds.json',
      CLOUD_ML_REGION: 'europe-west4',
    })

    expect(config.resources).toEqual({ memoryMb: 8192, vcpus: 4, diskGb: 20 })
    expect(config.sshTimeoutMs).toBe(5000)
    expect(config.networkSubnet).toBe(77)
    expect(config.credentialsEnvPath).toBe('/tmp/creds.json')
    expect(config.vertexRegion).toBe('europe-west4')
  })

  it('rejects invalid numbers', () => {
    let caught: unknown
    try {
      loadConfig({ VMSPACE_VM_CPUS: 'many' })
    } catch (err) {
      caught = err
    }

    expect(isVmspaceError(caught, 'InvalidConfig')).toBe(true)
    expect(caught).toHaveProperty(
      'message',
      'VMSPACE_VM_CPUS must be an integer between 1 and 256, got "many".',
    )
  })

  it('rejects an out-of-range subnet', () => {
    expect(() => loadConfig({ NETWORK_SUBNET: '300' })).toThrow(
      'NETWORK_SUBNET must be an integer between 0 and 255, got "300".',
    )
  })
})

describe('parseResourceOverrides', () => {
  it('leaves absent flags out', () => {
    expect(parseResourceOverrides({ cpus: '4' })).toEqual({ vcpus: 4 })
    expect(parseResourceOverrides({})).toEqual({})
  })

  it('enforces minimums', () => {
    expect(() => parseResourceOverrides({ memory: '256' })).toThrow(
      `--memory must be an integer between 512 and ${Number.MAX_SAFE_INTEGER}, got "256".`,
    )
    expect(() => parseResourceOverrides({ disk: '2' })).toThrow(
      `--disk must be an integer between 4 and ${Number.MAX_SAFE_INTEGER}, got "2".`,
    )
  })
})

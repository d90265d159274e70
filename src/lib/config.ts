import { VmspaceError } from './errors'
import type { ResourceSpec } from './vm/types'

export interface Config {
  resources: ResourceSpec
  sshTimeoutMs: number
  bootTimeoutMs: number
  bootRetries: number
  bootPollIntervalMs: number
  networkSubnet: number | null
  credentialsEnvPath: string | null
  vertexProjectId: string | null
  vertexRegion: string
}

type Env = Record<string, string | undefined>

function parseBounded(
  raw: string,
  label: string,
  min: number,
  max: number,
  recovery: string,
): number {
  const value = Number(raw)
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new VmspaceError(
      'InvalidConfig',
      `${label} must be an integer between ${min} and ${max}, got "${raw}".`,
      recovery,
    )
  }
  return value
}

function readInt(
  env: Env,
  key: string,
  fallback: number,
  min: number,
  max = Number.MAX_SAFE_INTEGER,
): number {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') return fallback
  return parseBounded(raw, key, min, max, `Fix or unset ${key} and retry.`)
}

export function loadConfig(env: Env = process.env): Config {
  const subnet = env.NETWORK_SUBNET
  return {
    resources: {
      memoryMb: readInt(env, 'VMSPACE_VM_MEMORY_MB', 4096, 512),
      vcpus: readInt(env, 'VMSPACE_VM_CPUS', 2, 1, 256),
      diskGb: readInt(env, 'VMSPACE_VM_DISK_GB', 20, 4),
    },
    sshTimeoutMs: readInt(env, 'VMSPACE_SSH_TIMEOUT_SEC', 30, 1) * 1000,
    bootTimeoutMs: readInt(env, 'VMSPACE_BOOT_TIMEOUT_SEC', 120, 5) * 1000,
    bootRetries: readInt(env, 'VMSPACE_BOOT_RETRIES', 2, 0, 10),
    bootPollIntervalMs: 5000,
    networkSubnet:
      subnet === undefined || subnet === ''
        ? null
        : readInt(env, 'NETWORK_SUBNET', 123, 0, 255),
    credentialsEnvPath: env.GCP_CREDENTIALS_PATH || null,
    vertexProjectId: env.ANTHROPIC_VERTEX_PROJECT_ID || null,
    vertexRegion: env.CLOUD_ML_REGION || 'us-central1',
  }
}

/** Parse resource override flags; absent flags stay undefined. */
export function parseResourceOverrides(flags: {
  memory?: string
  cpus?: string
  disk?: string
}): Partial<ResourceSpec> {
  const overrides: Partial<ResourceSpec> = {}
  const max = Number.MAX_SAFE_INTEGER
  if (flags.memory !== undefined) {
    overrides.memoryMb = parseBounded(
      flags.memory,
      '--memory',
      512,
      max,
      'Pass memory in MiB, e.g. --memory 8192.',
    )
  }
  if (flags.cpus !== undefined) {
    overrides.vcpus = parseBounded(
      flags.cpus,
      '--cpus',
      1,
      256,
      'Pass a vCPU count, e.g. --cpus 4.',
    )
  }
  if (flags.disk !== undefined) {
    overrides.diskGb = parseBounded(
      flags.disk,
      '--disk',
      4,
      max,
      'Pass disk size in GiB, e.g. --disk 40.',
    )
  }
  return overrides
}

import fs from 'node:fs'
import path from 'node:path'
import * as debug from '../debug'
import { outputTail, VmspaceError } from '../errors'
import { getTerraformDir } from './paths'
import { buildTerraformConfig, MACHINE_NAME } from './provision'
import type { ApplyRequest, ProvisioningBackend, VmLifecycle } from './types'
import { commandExists, run } from './utils'

const DOMAIN_ADDRESS = 'libvirt_domain.vm'
const CONFIG_FILE = 'main.tf.json'

interface TerraformOutput {
  value: unknown
}

function isTerraformOutput(value: unknown): value is TerraformOutput {
  return typeof value === 'object' && value !== null && 'value' in value
}

export function parseOutputs(stdout: string): Record<string, unknown> {
  const trimmed = stdout.trim()
  if (!trimmed) return {}

  try {
    const parsed: unknown = JSON.parse(trimmed)
    if (!parsed || typeof parsed !== 'object') return {}
    const outputs: Record<string, unknown> = {}
    for (const [key, entry] of Object.entries(parsed)) {
      if (isTerraformOutput(entry)) outputs[key] = entry.value
    }
    return outputs
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    debug.log(`[terraform] unable to parse outputs: ${message}`)
    return {}
  }
}

/** Map `virsh domstate` output onto the lifecycle the controller reasons about. */
export function parseDomainState(output: string): VmLifecycle {
  return output.trim().toLowerCase() === 'running' ? 'running' : 'stopped'
}

export function buildApplyArgs(request: ApplyRequest): string[] {
  const vars: Record<string, string> = {
    memory_mb: String(request.resources.memoryMb),
    vcpus: String(request.resources.vcpus),
    disk_gb: String(request.resources.diskGb),
    network_subnet_third_octet: String(request.networkSubnet),
    user_uid: String(process.getuid?.() ?? 1000),
  }
  if (request.credentials?.vertexProjectId) {
    vars.vertex_project_id = request.credentials.vertexProjectId
    vars.vertex_region = request.credentials.vertexRegion
  }

  const args = ['apply', '-auto-approve', '-input=false']
  for (const [key, value] of Object.entries(vars)) {
    args.push(`-var=${key}=${value}`)
  }
  return args
}

/**
 * Provisioning backend built on the terraform CLI and the libvirt provider.
 * Terraform's own state file is the source of truth for whether the VM exists.
 */
export class TerraformBackend implements ProvisioningBackend {
  private readonly dir: string

  constructor(dir: string = getTerraformDir()) {
    this.dir = dir
  }

  describe(): string {
    return `Terraform state in ${this.dir}`
  }

  /** Addresses in the state store, or null when the store cannot be read. */
  private stateAddresses(): string[] | null {
    if (!commandExists('terraform')) return []
    if (!fs.existsSync(path.join(this.dir, 'terraform.tfstate'))) return []

    const list = run('terraform', ['state', 'list'], { cwd: this.dir })
    if (!list.ok) {
      debug.log(`[terraform] state list failed: ${list.stderr.trim()}`)
      return null
    }
    return list.stdout
      .split('\n')
      .map((line) => line.trim())
      .filter(Boolean)
  }

  hasResources(): boolean {
    const addresses = this.stateAddresses()
    return addresses === null || addresses.length > 0
  }

  inspect(): VmLifecycle {
    const addresses = this.stateAddresses()
    // Unreadable state counts as stopped, never absent.
    if (addresses === null) return 'stopped'
    if (!addresses.includes(DOMAIN_ADDRESS)) return 'absent'

    if (!commandExists('virsh')) return 'stopped'
    const domstate = run('virsh', [
      '--connect',
      'qemu:///system',
      'domstate',
      MACHINE_NAME,
    ])
    if (!domstate.ok) return 'stopped'
    return parseDomainState(domstate.stdout)
  }

  apply(request: ApplyRequest): void {
    this.prepare()

    const env: Record<string, string> = {}
    if (request.credentials) {
      env.TF_VAR_credentials_b64 = request.credentials.base64
    }

    const result = run('terraform', buildApplyArgs(request), {
      cwd: this.dir,
      env,
      inheritStdio: debug.isEnabled(),
    })
    if (!result.ok) {
      throw new VmspaceError(
        'ProvisioningFailed',
        `terraform apply failed (exit ${result.status}).\n${outputTail(result.stderr || result.stdout)}`,
        `Inspect ${this.describe()} (terraform plan), fix the cause and retry.`,
      )
    }
  }

  destroy(): void {
    this.prepare()

    const args = ['destroy', '-auto-approve', '-input=false']
    const result = run('terraform', args, {
      cwd: this.dir,
      inheritStdio: debug.isEnabled(),
    })
    if (!result.ok) {
      throw new VmspaceError(
        'ProvisioningFailed',
        `terraform destroy failed (exit ${result.status}).\n${outputTail(result.stderr || result.stdout)}`,
        `Inspect ${this.describe()} with "terraform state list", then run "vmspace destroy" again.`,
      )
    }
  }

  outputs(): Record<string, unknown> {
    if (!commandExists('terraform')) return {}
    const result = run('terraform', ['output', '-json'], { cwd: this.dir })
    if (!result.ok) return {}
    return parseOutputs(result.stdout)
  }

  output(key: string): unknown {
    return this.outputs()[key]
  }

  private prepare(): void {
    if (!commandExists('terraform')) {
      throw new VmspaceError(
        'ProvisioningFailed',
        'terraform is not installed.',
        'Install Terraform (https://developer.hashicorp.com/terraform/install) and retry.',
      )
    }

    fs.mkdirSync(this.dir, { recursive: true })
    fs.writeFileSync(
      path.join(this.dir, CONFIG_FILE),
      `${JSON.stringify(buildTerraformConfig(), null, 2)}\n`,
    )

    if (!fs.existsSync(path.join(this.dir, '.terraform'))) {
      debug.log('[terraform] working directory not initialized, running init')
      const init = run('terraform', ['init', '-input=false'], {
        cwd: this.dir,
        inheritStdio: debug.isEnabled(),
      })
      if (!init.ok) {
        throw new VmspaceError(
          'ProvisioningFailed',
          `terraform init failed.\n${outputTail(init.stderr || init.stdout)}`,
          'Check network access to the Terraform registry, then retry.',
        )
      }
    }
  }
}

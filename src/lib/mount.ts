import fs from 'node:fs'
import path from 'node:path'
import * as debug from './debug'
import {
  errorMessage,
  outputTail,
  type Warning,
  VmspaceError,
  warning,
} from './errors'
import type { Endpoint } from './vm/types'
import { commandExists, run } from './vm/utils'

/** The single host-side binding of the VM's workspace root. */
export interface MountBinding {
  readonly mountDir: string
  current(): string | null
  ensureMounted(endpoint: Endpoint): Warning[]
  unmount(): boolean
}

export function mountSource(endpoint: Endpoint): string {
  return `${endpoint.user}@${endpoint.host}:${endpoint.workspaceRoot}`
}

/**
 * Find the source mounted at `mountDir` in `mount` output. Linux prints
 * `src on /dir type fuse.sshfs (...)`, macOS `src on /dir (macfuse, ...)`.
 */
export function parseMountTable(output: string, mountDir: string): string | null {
  const marker = ` on ${mountDir} `
  for (const line of output.split('\n')) {
    const index = line.indexOf(marker)
    if (index > 0) return line.slice(0, index)
  }
  return null
}

export function buildSshfsArgs(endpoint: Endpoint, mountDir: string): string[] {
  return [
    mountSource(endpoint),
    mountDir,
    '-o',
    [
      'reconnect',
      'ServerAliveInterval=15',
      'ServerAliveCountMax=3',
      `IdentityFile=${endpoint.keyPath}`,
      'StrictHostKeyChecking=no',
      'UserKnownHostsFile=/dev/null',
    ].join(','),
  ]
}

export function unmountCommand(
  platform: NodeJS.Platform = process.platform,
  exists: (command: string) => boolean = commandExists,
): { command: string; args: string[] } {
  if (platform === 'darwin') return { command: 'umount', args: [] }
  if (exists('fusermount')) return { command: 'fusermount', args: ['-u'] }
  if (exists('fusermount3')) return { command: 'fusermount3', args: ['-u'] }
  return { command: 'umount', args: [] }
}

export class MountManager implements MountBinding {
  readonly mountDir: string
  private readonly platform: NodeJS.Platform

  constructor(mountDir: string, platform: NodeJS.Platform = process.platform) {
    this.mountDir = path.resolve(mountDir)
    this.platform = platform
  }

  current(): string | null {
    const result = run('mount', [])
    if (!result.ok) return null
    return parseMountTable(result.stdout, this.mountDir)
  }

  ensureMounted(endpoint: Endpoint): Warning[] {
    const warnings: Warning[] = []
    const expected = mountSource(endpoint)
    const existing = this.current()
    if (existing === expected) {
      debug.log(`[mount] ${this.mountDir} already bound to ${expected}`)
      return warnings
    }

    if (existing !== null) {
      warnings.push(
        warning(
          'StaleMount',
          `${this.mountDir} was bound to ${existing}; rebinding to ${expected}.`,
        ),
      )
      try {
        this.unmount()
      } catch (err) {
        debug.log(`[mount] stale unmount failed: ${errorMessage(err)}`)
        warnings.push(
          warning(
            'MountUnavailable',
            `Could not unmount ${this.mountDir}; it stays bound to ${existing}. Close editors and shells using it, then connect again.`,
          ),
        )
        return warnings
      }
    }

    if (!commandExists('sshfs')) {
      warnings.push(
        warning(
          'MountUnavailable',
          `sshfs is not installed, so workspaces are not mounted at ${this.mountDir}. Shell sessions and push/fetch still work.`,
        ),
      )
      return warnings
    }

    try {
      fs.mkdirSync(this.mountDir, { recursive: true })
    } catch (err) {
      warnings.push(
        warning(
          'MountUnavailable',
          `Cannot create ${this.mountDir}: ${errorMessage(err)}. Shell sessions and push/fetch still work.`,
        ),
      )
      return warnings
    }
    const result = run('sshfs', buildSshfsArgs(endpoint, this.mountDir))
    if (!result.ok) {
      warnings.push(
        warning(
          'MountUnavailable',
          `Mounting ${expected} at ${this.mountDir} failed: ${outputTail(result.stderr, 3)}`,
        ),
      )
    }
    return warnings
  }

  /** Returns false when nothing was mounted. */
  unmount(): boolean {
    if (this.current() === null) return false

    const { command, args } = unmountCommand(this.platform)
    const result = run(command, [...args, this.mountDir])
    if (!result.ok) {
      throw new VmspaceError(
        'MountFailed',
        `Failed to unmount ${this.mountDir}: ${outputTail(result.stderr || result.stdout, 3)}`,
        `Close editors and shells using ${this.mountDir}, then retry.`,
      )
    }
    debug.log(`[mount] unmounted ${this.mountDir}`)
    return true
  }
}

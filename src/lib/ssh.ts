import * as debug from './debug'
import { type ErrorKind, VmspaceError } from './errors'
import type { Endpoint } from './vm/types'
import { run, shellEscape } from './vm/utils'

export interface RemoteResult {
  ok: boolean
  status: number
  stdout: string
  stderr: string
  timedOut: boolean
}

export interface SessionOptions {
  cwd: string
  command?: string[]
  root?: boolean
}

/** Point-to-point channel into the guest. */
export interface RemoteShell {
  exec(command: string, options?: { timeoutMs?: number }): RemoteResult
  probe(connectTimeoutSec: number): boolean
  session(options: SessionOptions): number
  /** URL a host-side git can push to / fetch from for a guest path. */
  gitUrl(guestPath: string): string
  /** Extra environment the host-side git needs to reach the guest. */
  gitEnv(): Record<string, string>
}

export function getSSHForwardingArgs(
  env: Record<string, string | undefined> = process.env,
): string[] {
  return env.SSH_AUTH_SOCK ? ['-A'] : []
}

export function baseSshOptions(endpoint: Endpoint): string[] {
  return [
    '-i',
    endpoint.keyPath,
    '-o',
    'StrictHostKeyChecking=no',
    '-o',
    'UserKnownHostsFile=/dev/null',
    '-o',
    'LogLevel=ERROR',
  ]
}

export function buildSessionCommand(options: SessionOptions): string {
  const cd = `cd ${shellEscape(options.cwd)}`
  const sudo = options.root ? 'sudo ' : ''
  if (options.command && options.command.length > 0) {
    const command = options.command.map((arg) => shellEscape(arg)).join(' ')
    return `${cd} && ${sudo}${command}`
  }
  return `${cd} && exec ${sudo}bash -l`
}

export class SshShell implements RemoteShell {
  private readonly endpoint: Endpoint
  private readonly defaultTimeoutMs: number

  constructor(endpoint: Endpoint, defaultTimeoutMs: number) {
    this.endpoint = endpoint
    this.defaultTimeoutMs = defaultTimeoutMs
  }

  private target(): string {
    return `${this.endpoint.user}@${this.endpoint.host}`
  }

  exec(command: string, options: { timeoutMs?: number } = {}): RemoteResult {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs
    const connectTimeout = Math.max(
      1,
      Math.min(10, Math.floor(timeoutMs / 1000)),
    )
    const args = [
      ...baseSshOptions(this.endpoint),
      '-o',
      'BatchMode=yes',
      '-o',
      `ConnectTimeout=${connectTimeout}`,
      '-T',
      this.target(),
      command,
    ]
    return run('ssh', args, { timeout: timeoutMs })
  }

  probe(connectTimeoutSec: number): boolean {
    const args = [
      ...baseSshOptions(this.endpoint),
      '-o',
      'BatchMode=yes',
      '-o',
      `ConnectTimeout=${connectTimeoutSec}`,
      this.target(),
      'exit',
    ]
    const result = run('ssh', args, {
      timeout: (connectTimeoutSec + 5) * 1000,
    })
    debug.log(
      `[ssh] probe ${this.endpoint.host}: ${result.ok ? 'ok' : 'failed'}`,
    )
    return result.ok
  }

  session(options: SessionOptions): number {
    const interactive = !options.command || options.command.length === 0
    const args = [
      ...baseSshOptions(this.endpoint),
      ...getSSHForwardingArgs(),
      interactive ? '-t' : '-T',
      this.target(),
      buildSessionCommand(options),
    ]
    const result = run('ssh', args, { inheritStdio: true })
    return result.status
  }

  gitUrl(guestPath: string): string {
    return `ssh://${this.endpoint.user}@${this.endpoint.host}${guestPath}`
  }

  gitEnv(): Record<string, string> {
    const options = baseSshOptions(this.endpoint)
      .map((arg) => (arg.startsWith('-') ? arg : shellEscape(arg)))
      .join(' ')
    return { GIT_SSH_COMMAND: `ssh ${options} -o BatchMode=yes` }
  }
}

/** Run a guest command that must succeed. Timeouts surface as errors and are never retried. */
export function execOrThrow(
  shell: RemoteShell,
  command: string,
  failure: { kind: ErrorKind; message: string; recovery?: string },
): RemoteResult {
  const result = shell.exec(command)
  if (result.timedOut) {
    throw new VmspaceError(
      'CommandTimedOut',
      `${failure.message}: the remote command timed out.`,
      'Check the VM with "vmspace status". The command was not retried.',
    )
  }
  if (!result.ok) {
    const detail = result.stderr.trim() || result.stdout.trim()
    throw new VmspaceError(
      failure.kind,
      detail ? `${failure.message}:\n${detail}` : failure.message,
      failure.recovery,
    )
  }
  return result
}

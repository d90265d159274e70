import { spawnSync } from 'node:child_process'
import * as debug from '../debug'

const SECRET_ENV_KEYS = ['TF_VAR_credentials_b64']

function sanitizeArg(arg: string): string {
  for (const key of SECRET_ENV_KEYS) {
    if (arg.includes(`${key}=`)) return `${key}=<redacted>`
  }
  return arg
}

export interface RunResult {
  ok: boolean
  status: number
  stdout: string
  stderr: string
  timedOut: boolean
}

export interface RunOptions {
  cwd?: string
  env?: Record<string, string>
  inheritStdio?: boolean
  input?: string
  timeout?: number
}

export function commandExists(command: string): boolean {
  const result = spawnSync('sh', ['-c', `command -v ${shellEscape(command)}`], {
    stdio: ['pipe', 'pipe', 'pipe'],
  })
  return result.status === 0
}

export function run(
  command: string,
  args: string[],
  options: RunOptions = {},
): RunResult {
  const printable = args.map((arg) => sanitizeArg(arg))
  debug.log(`[run] ${command} ${printable.join(' ')}`)

  const result = spawnSync(command, args, {
    cwd: options.cwd,
    env: options.env ? { ...process.env, ...options.env } : process.env,
    input: options.input,
    stdio: options.inheritStdio ? 'inherit' : ['pipe', 'pipe', 'pipe'],
    timeout: options.timeout,
    encoding: 'utf-8',
  })

  const stdout = typeof result.stdout === 'string' ? result.stdout : ''
  const stderr = typeof result.stderr === 'string' ? result.stderr : ''
  const errorCode =
    result.error && 'code' in result.error ? result.error.code : undefined
  const timedOut = errorCode === 'ETIMEDOUT'
  if (result.error && !timedOut) {
    debug.log(`[run] ${command} failed to spawn: ${result.error.message}`)
  }

  debug.logCommand(command, printable, {
    status: result.status,
    stdout,
    stderr,
  })

  return {
    ok: result.status === 0,
    status: result.status ?? 1,
    stdout,
    stderr,
    timedOut,
  }
}

export function shellEscape(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`
}

export function sleep(ms: number): void {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms)
}

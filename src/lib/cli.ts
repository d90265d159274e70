import type { ArgsDef } from 'citty'
import { parseResourceOverrides } from './config'
import * as debug from './debug'
import { errorMessage, isVmspaceError } from './errors'
import { dispatch, type Intent, type ProvisionOptions } from './orchestrator'
import * as ui from './ui'

export const provisionArgs = {
  memory: {
    type: 'string',
    description: 'Memory in MiB (only applied when the VM is created)',
  },
  cpus: {
    type: 'string',
    description: 'vCPU count (only applied when the VM is created)',
  },
  disk: {
    type: 'string',
    description: 'Disk size in GiB (only applied when the VM is created)',
  },
  credentials: {
    type: 'string',
    description: 'Credentials file to install in a newly created VM',
  },
} satisfies ArgsDef

function stringArg(value: unknown): string | undefined {
  if (typeof value === 'number') return String(value)
  return typeof value === 'string' && value !== '' ? value : undefined
}

export function provisionOptions(
  args: Record<string, unknown>,
): ProvisionOptions {
  return {
    overrides: parseResourceOverrides({
      memory: stringArg(args.memory),
      cpus: stringArg(args.cpus),
      disk: stringArg(args.disk),
    }),
    credentialsPath: stringArg(args.credentials),
  }
}

export function reportFailure(err: unknown): void {
  const lines = [errorMessage(err)]
  if (isVmspaceError(err) && err.recovery) {
    lines.push(ui.colors.dim(err.recovery))
  }
  lines.push(
    debug.isEnabled()
      ? `Debug log: ${debug.getLogPath()}`
      : 'Run again with --debug for details.',
  )
  debug.error(lines[0])
  ui.error(lines.join('\n'))
}

/** Build the intent, dispatch it, and map failures to exit code 1. */
export function execute(build: () => Intent): number {
  try {
    return dispatch(build())
  } catch (err) {
    reportFailure(err)
    return 1
  }
}

/** Arguments after a literal `--`, run as a one-shot command. */
export function trailingCommand(rawArgs: string[]): {
  before: string[]
  command: string[]
} {
  const index = rawArgs.indexOf('--')
  if (index === -1) return { before: rawArgs, command: [] }
  return { before: rawArgs.slice(0, index), command: rawArgs.slice(index + 1) }
}

export async function confirm(message: string, yes: boolean): Promise<boolean> {
  if (yes) return true
  const answer = await ui.prompts.confirm({ message, initialValue: false })
  if (ui.prompts.isCancel(answer) || answer !== true) {
    ui.outro('Cancelled.')
    return false
  }
  return true
}

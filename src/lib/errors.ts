export type ErrorKind =
  | 'ProvisioningFailed'
  | 'Unreachable'
  | 'WorkspaceCorrupt'
  | 'WorkspaceNotFound'
  | 'SyncRejected'
  | 'CommandTimedOut'
  | 'NotAGitRepo'
  | 'VmAbsent'
  | 'MountFailed'
  | 'InvalidConfig'

export type WarningKind =
  | 'DirtyWorkingTree'
  | 'MountUnavailable'
  | 'StaleMount'
  | 'CredentialsNotFound'
  | 'ResourceOverrideIgnored'
  | 'ProvisioningIncomplete'

export interface Warning {
  kind: WarningKind
  message: string
}

/**
 * A failure the user can act on. `recovery` names the concrete next step and
 * is printed below the message.
 */
export class VmspaceError extends Error {
  public readonly kind: ErrorKind
  public readonly recovery: string | null

  constructor(kind: ErrorKind, message: string, recovery?: string) {
    super(message)
    this.name = 'VmspaceError'
    this.kind = kind
    this.recovery = recovery ?? null
  }
}

export function isVmspaceError(
  err: unknown,
  kind?: ErrorKind,
): err is VmspaceError {
  if (!(err instanceof VmspaceError)) return false
  return kind === undefined || err.kind === kind
}

export function warning(kind: WarningKind, message: string): Warning {
  return { kind, message }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/** Last few lines of a command's output, for surfacing backend failures verbatim. */
export function outputTail(output: string, lines = 15): string {
  return output.trim().split('\n').slice(-lines).join('\n')
}

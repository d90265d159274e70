import { beforeEach, describe, expect, it, vi } from 'vitest'

vi.mock('../src/lib/orchestrator', () => ({
  dispatch: vi.fn(),
}))

vi.mock('../src/lib/ui', () => ({
  error: vi.fn(),
  outro: vi.fn(),
  colors: { dim: (text: string) => text },
  prompts: {
    confirm: vi.fn(),
    isCancel: vi.fn(),
  },
}))

// Mock process.exit to prevent test termination
const mockExit = vi
  .spyOn(process, 'exit')
  .mockImplementation(() => undefined as never)

import cleanAllCommand from '../src/commands/clean-all'
import connectCommand from '../src/commands/connect'
import destroyCommand from '../src/commands/destroy'
import pushCommand from '../src/commands/push'
import { VmspaceError } from '../src/lib/errors'
import { dispatch } from '../src/lib/orchestrator'
import * as ui from '../src/lib/ui'

type Runnable = {
  run: (ctx: {
    args: Record<string, unknown>
    rawArgs: string[]
  }) => Promise<void>
}

async function runCommand(
  command: unknown,
  args: Record<string, unknown>,
  rawArgs: string[] = [],
) {
  await (command as Runnable).run({ args, rawArgs })
}

describe('vmspace commands', () => {
  beforeEach(() => {
    vi.clearAllMocks()
    vi.mocked(dispatch).mockReturnValue(0)
    vi.mocked(ui.prompts.isCancel).mockReturnValue(false)
  })

  it('push dispatches a push intent with parsed overrides', async () => {
    await runCommand(pushCommand, { branch: 'feature-x', memory: '8192' })

    expect(dispatch).toHaveBeenCalledWith({
      kind: 'push',
      cwd: process.cwd(),
      branch: 'feature-x',
      overrides: { memoryMb: 8192 },
      credentialsPath: undefined,
    })
    expect(mockExit).toHaveBeenCalledWith(0)
  })

  it('connect passes everything after -- as the command', async () => {
    await runCommand(
      connectCommand,
      { branch: 'feature-x', root: false },
      ['feature-x', '--', 'npm', 'test'],
    )

    expect(dispatch).toHaveBeenCalledWith({
      kind: 'connect',
      cwd: process.cwd(),
      branch: 'feature-x',
      root: false,
      command: ['npm', 'test'],
      overrides: {},
      credentialsPath: undefined,
    })
  })

  it('connect does not mistake the command for a branch', async () => {
    await runCommand(connectCommand, { branch: 'ls', root: true }, ['--', 'ls'])

    expect(dispatch).toHaveBeenCalledWith(
      expect.objectContaining({ branch: null, root: true, command: ['ls'] }),
    )
  })

  it('reports invalid flags without dispatching', async () => {
    await runCommand(pushCommand, { branch: 'feature-x', cpus: 'lots' })

    expect(dispatch).not.toHaveBeenCalled()
    expect(ui.error).toHaveBeenCalledWith(
      '--cpus must be an integer between 1 and 256, got "lots".\nPass a vCPU count, e.g. --cpus 4.\nRun again with --debug for details.',
    )
    expect(mockExit).toHaveBeenCalledWith(1)
  })

  it('prints the recovery step of a failed operation', async () => {
    vi.mocked(dispatch).mockImplementation(() => {
      throw new VmspaceError(
        'ProvisioningFailed',
        'terraform apply failed (exit 1).',
        'Inspect the state and retry.',
      )
    })

    await runCommand(pushCommand, { branch: 'feature-x' })

    expect(ui.error).toHaveBeenCalledWith(
      'terraform apply failed (exit 1).\nInspect the state and retry.\nRun again with --debug for details.',
    )
    expect(mockExit).toHaveBeenCalledWith(1)
  })

  it('destroy asks for confirmation', async () => {
    vi.mocked(ui.prompts.confirm).mockResolvedValue(false)

    await runCommand(destroyCommand, { yes: false })

    expect(dispatch).not.toHaveBeenCalled()
    expect(ui.outro).toHaveBeenCalledWith('Cancelled.')
    expect(mockExit).toHaveBeenCalledWith(0)
  })

  it('destroy --yes skips the prompt', async () => {
    await runCommand(destroyCommand, { yes: true })

    expect(ui.prompts.confirm).not.toHaveBeenCalled()
    expect(dispatch).toHaveBeenCalledWith({ kind: 'destroy' })
  })

  it('clean-all dispatches after confirmation', async () => {
    vi.mocked(ui.prompts.confirm).mockResolvedValue(true)

    await runCommand(cleanAllCommand, { yes: false })

    expect(dispatch).toHaveBeenCalledWith({
      kind: 'clean-all',
      cwd: process.cwd(),
    })
  })
})

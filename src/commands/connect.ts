import { defineCommand } from 'citty'
import { execute, provisionArgs, provisionOptions, trailingCommand } from '../lib/cli'

export default defineCommand({
  meta: {
    name: 'connect',
    description:
      'Open a shell in the workspace for a branch, creating the VM and workspace on first use',
  },
  args: {
    branch: {
      type: 'positional',
      description: 'Branch to work on (defaults to the current branch)',
      required: false,
    },
    root: {
      type: 'boolean',
      description: 'Open the session as root',
      default: false,
    },
    ...provisionArgs,
  },
  run: async ({ args, rawArgs }) => {
    const { before, command } = trailingCommand(rawArgs)
    const branch =
      typeof args.branch === 'string' && before.includes(args.branch)
        ? args.branch
        : null

    const exitCode = execute(() => ({
      kind: 'connect',
      cwd: process.cwd(),
      branch,
      root: Boolean(args.root),
      command,
      ...provisionOptions(args),
    }))
    process.exit(exitCode)
  },
})

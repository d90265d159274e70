import { defineCommand } from 'citty'
import { execute, provisionArgs, provisionOptions } from '../lib/cli'

export default defineCommand({
  meta: {
    name: 'push',
    description: 'Send a branch from this repository to its workspace in the VM',
  },
  args: {
    branch: {
      type: 'positional',
      description: 'Branch to push (created from HEAD if it does not exist)',
      required: true,
    },
    ...provisionArgs,
  },
  run: async ({ args }) => {
    const exitCode = execute(() => ({
      kind: 'push',
      cwd: process.cwd(),
      branch: String(args.branch),
      ...provisionOptions(args),
    }))
    process.exit(exitCode)
  },
})

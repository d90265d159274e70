import { defineCommand } from 'citty'
import { execute } from '../lib/cli'

export default defineCommand({
  meta: {
    name: 'fetch',
    description: 'Bring commits from a workspace back into this repository',
  },
  args: {
    branch: {
      type: 'positional',
      description: 'Branch to fetch',
      required: true,
    },
    unmount: {
      type: 'boolean',
      description: 'Unmount the workspaces afterwards',
      default: false,
    },
  },
  run: async ({ args }) => {
    const exitCode = execute(() => ({
      kind: 'fetch',
      cwd: process.cwd(),
      branch: String(args.branch),
      unmount: Boolean(args.unmount),
    }))
    process.exit(exitCode)
  },
})

import { defineCommand } from 'citty'
import { execute } from '../lib/cli'

export default defineCommand({
  meta: {
    name: 'clean',
    description: 'Delete one workspace from the VM',
  },
  args: {
    name: {
      type: 'positional',
      description: 'Workspace name, as shown by "vmspace list"',
      required: true,
    },
  },
  run: async ({ args }) => {
    const exitCode = execute(() => ({
      kind: 'clean',
      cwd: process.cwd(),
      name: String(args.name),
    }))
    process.exit(exitCode)
  },
})

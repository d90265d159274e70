import { defineCommand } from 'citty'
import { confirm, execute } from '../lib/cli'

export default defineCommand({
  meta: {
    name: 'destroy',
    description: 'Unmount the workspaces and destroy the VM',
  },
  args: {
    yes: {
      type: 'boolean',
      description: 'Skip the confirmation prompt',
      default: false,
    },
  },
  run: async ({ args }) => {
    const confirmed = await confirm(
      'Destroy the VM and every workspace in it?',
      Boolean(args.yes),
    )
    if (!confirmed) return process.exit(0)

    process.exit(execute(() => ({ kind: 'destroy' })))
  },
})

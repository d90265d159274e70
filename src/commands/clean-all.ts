import { defineCommand } from 'citty'
import { confirm, execute } from '../lib/cli'

export default defineCommand({
  meta: {
    name: 'clean-all',
    description: 'Delete every workspace in the VM',
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
      'Delete every workspace in the VM? Uncommitted work is lost.',
      Boolean(args.yes),
    )
    if (!confirmed) return process.exit(0)

    process.exit(execute(() => ({ kind: 'clean-all', cwd: process.cwd() })))
  },
})

import { defineCommand } from 'citty'
import { execute } from '../lib/cli'

export default defineCommand({
  meta: {
    name: 'list',
    description: 'List workspaces in the VM',
  },
  run: async () => {
    process.exit(execute(() => ({ kind: 'list' })))
  },
})

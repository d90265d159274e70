import { defineCommand } from 'citty'
import { execute } from '../lib/cli'

export default defineCommand({
  meta: {
    name: 'status',
    description: 'Show VM state, address, resources and mount',
  },
  run: async () => {
    process.exit(execute(() => ({ kind: 'status' })))
  },
})

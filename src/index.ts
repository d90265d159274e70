import { defineCommand, runMain } from 'citty'
import clean from './commands/clean'
import cleanAll from './commands/clean-all'
import connect from './commands/connect'
import destroy from './commands/destroy'
import fetch from './commands/fetch'
import help from './commands/help'
import list from './commands/list'
import push from './commands/push'
import status from './commands/status'
import * as debug from './lib/debug'

// Parse the global debug flag before citty processes argv. Anything after
// `--` belongs to the one-shot command.
const separatorIndex = process.argv.indexOf('--')
const debugFlagIndices = process.argv
  .map((arg, index) => ({ arg, index }))
  .filter((entry) => entry.arg === '--debug')
  .map((entry) => entry.index)
  .filter((index) => separatorIndex === -1 || index < separatorIndex)

if (debugFlagIndices.length > 0) {
  // Remove from right to left so indexes stay valid.
  debugFlagIndices
    .sort((a, b) => b - a)
    .forEach((index) => {
      process.argv.splice(index, 1)
    })
  const logPath = debug.enable()
  debug.log(`vmspace v${__VERSION__}`)
  debug.log(`args: ${process.argv.slice(2).join(' ')}`)
  debug.log(`cwd: ${process.cwd()}`)
  debug.log(`node: ${process.version}`)
  debug.log(`platform: ${process.platform} ${process.arch}`)
  debug.log(`log file: ${logPath}`)
}

const main = defineCommand({
  meta: {
    name: 'vmspace',
    version: __VERSION__,
    description:
      'Branch-scoped git workspaces inside one persistent, disposable VM.',
  },
  subCommands: {
    connect,
    push,
    fetch,
    list,
    clean,
    'clean-all': cleanAll,
    destroy,
    status,
    help,
  },
})

runMain(main)

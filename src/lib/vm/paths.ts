import fs from 'node:fs'
import { homedir } from 'node:os'
import path from 'node:path'

let resolvedVmHome: string | null = null

function pickWritableVmHome(): string {
  const preferred =
    process.env.VMSPACE_HOME || path.join(homedir(), '.vmspace')
  try {
    fs.mkdirSync(preferred, { recursive: true })
    return preferred
  } catch {
    const fallback = path.join(process.cwd(), '.vmspace')
    fs.mkdirSync(fallback, { recursive: true })
    return fallback
  }
}

export function getVmHome(): string {
  if (!resolvedVmHome) {
    resolvedVmHome = pickWritableVmHome()
  }
  return resolvedVmHome
}

export function getTerraformDir(): string {
  return path.join(getVmHome(), 'terraform')
}

export function getMountDir(): string {
  return process.env.VMSPACE_MOUNT_DIR || path.join(homedir(), 'vmspace')
}

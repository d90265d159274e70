import { accessSync, constants, readFileSync, statSync } from 'node:fs'
import { homedir } from 'node:os'
import { join } from 'node:path'
import * as debug from './debug'
import type { ApplyRequest } from './vm/types'

export type CredentialSource = 'explicit' | 'env' | 'default'

export interface CredentialMaterial {
  source: CredentialSource
  path: string
  vertexProjectId: string | null
  vertexRegion: string
}

export interface CredentialCandidate {
  source: CredentialSource
  path: string
}

export interface ResolveCredentialsOptions {
  explicitPath?: string
  envPath?: string | null
  vertexProjectId?: string | null
  vertexRegion?: string
}

export function getDefaultCredentialsPath(): string {
  return join(homedir(), '.config', 'gcloud', 'application_default_credentials.json')
}

/**
 * Candidate credential files in precedence order:
 * 1. explicit override (--credentials)
 * 2. GCP_CREDENTIALS_PATH
 * 3. ~/.config/gcloud/application_default_credentials.json
 */
export function credentialCandidates(
  options: ResolveCredentialsOptions = {},
): CredentialCandidate[] {
  const candidates: CredentialCandidate[] = []
  if (options.explicitPath) {
    candidates.push({ source: 'explicit', path: options.explicitPath })
  }
  if (options.envPath) {
    candidates.push({ source: 'env', path: options.envPath })
  }
  candidates.push({ source: 'default', path: getDefaultCredentialsPath() })
  return candidates
}

function isReadableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) return false
    accessSync(path, constants.R_OK)
    return true
  } catch {
    return false
  }
}

/**
 * Resolve credential material. Returns null when nothing is found: running
 * without credentials is a valid configuration.
 */
export function resolveCredentials(
  options: ResolveCredentialsOptions = {},
): CredentialMaterial | null {
  for (const candidate of credentialCandidates(options)) {
    if (isReadableFile(candidate.path)) {
      debug.log(`[credentials] using ${candidate.source} file ${candidate.path}`)
      return {
        ...candidate,
        vertexProjectId: options.vertexProjectId ?? null,
        vertexRegion: options.vertexRegion ?? 'us-central1',
      }
    }
    debug.log(`[credentials] skipped ${candidate.source} path ${candidate.path}`)
  }
  return null
}

/**
 * Attach credentials to a creation request. The file is read here and only
 * travels inside the request; nothing is copied or cached on the host.
 */
export function deliverCredentials(
  material: CredentialMaterial,
  request: ApplyRequest,
): ApplyRequest {
  const base64 = readFileSync(material.path).toString('base64')
  return {
    ...request,
    credentials: {
      base64,
      vertexProjectId: material.vertexProjectId,
      vertexRegion: material.vertexRegion,
    },
  }
}

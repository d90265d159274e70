import fs from 'node:fs'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
  credentialCandidates,
  deliverCredentials,
  getDefaultCredentialsPath,
  resolveCredentials,
} from '../src/lib/credentials'
import { makeTempDir } from './helpers/git'

describe('credentialCandidates', () => {
  it('orders explicit, environment, then default paths', () => {
    expect(
      credentialCandidates({ explicitPath: '/a.json', envPath: '/b.json' }),
    ).toEqual([
      { source: 'explicit', path: '/a.json' },
      { source: 'env', path: '/b.json' },
      { source: 'default', path: getDefaultCredentialsPath() },
    ])
  })
})

describe('resolveCredentials', () => {
  let dir = ''
  const originalHome = process.env.HOME

  beforeEach(() => {
    dir = makeTempDir('credentials')
    // Keep the conventional default path inside the temp dir.
    process.env.HOME = dir
  })

  afterEach(() => {
    process.env.HOME = originalHome
    fs.rmSync(dir, { recursive: true, force: true })
  })

  function writeFile(name: string, content = 'test-secret'): string {
    const file = path.join(dir, name)
    fs.mkdirSync(path.dirname(file), { recursive: true })
    fs.writeFileSync(file, content)
    return file
  }

  it('prefers the explicit path', () => {
    const explicit = writeFile('explicit.json')
    const env = writeFile('env.json')

    const material = resolveCredentials({ explicitPath: explicit, envPath: env })

    expect(material).toEqual({
      source: 'explicit',
      path: explicit,
      vertexProjectId: null,
      vertexRegion: 'us-central1',
    })
  })

  it('skips missing files and falls through to the environment path', () => {
    const env = writeFile('env.json')

    const material = resolveCredentials({
      explicitPath: path.join(dir, 'missing.json'),
      envPath: env,
      vertexProjectId: 'test-project',
    })

    expect(material?.source).toBe('env')
    expect(material?.vertexProjectId).toBe('test-project')
  })

  it('falls back to the conventional default path', () => {
    const file = writeFile('.config/gcloud/application_default_credentials.json')

    expect(resolveCredentials({})?.path).toBe(file)
  })

  it('returns null when nothing is found', () => {
    expect(resolveCredentials({ envPath: path.join(dir, 'nope.json') })).toBeNull()
  })

  it('ignores directories', () => {
    fs.mkdirSync(path.join(dir, 'dir.json'))

    expect(resolveCredentials({ explicitPath: path.join(dir, 'dir.json') })).toBeNull()
  })

  it('delivers the file content as a payload on the request', () => {
    const file = writeFile('explicit.json')
    const material = resolveCredentials({ explicitPath: file })
    if (!material) throw new Error('expected credentials')

    const request = deliverCredentials(material, {
      resources: { memoryMb: 4096, vcpus: 2, diskGb: 20 },
      networkSubnet: 123,
      credentials: null,
    })

    expect(request.credentials).toEqual({
      base64: Buffer.from('test-secret').toString('base64'),
      vertexProjectId: null,
      vertexRegion: 'us-central1',
    })
  })
})

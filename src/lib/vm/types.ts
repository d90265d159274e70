export type VmLifecycle = 'absent' | 'stopped' | 'running'

export interface ResourceSpec {
  memoryMb: number
  vcpus: number
  diskGb: number
}

export interface Endpoint {
  host: string
  user: string
  keyPath: string
  workspaceRoot: string
}

export interface VmStatus {
  state: VmLifecycle
  endpoint: Endpoint | null
  resources: ResourceSpec | null
}

/** Opaque credential payload handed to the backend at creation time only. */
export interface CredentialPayload {
  base64: string
  vertexProjectId: string | null
  vertexRegion: string
}

export interface ApplyRequest {
  resources: ResourceSpec
  networkSubnet: number
  credentials: CredentialPayload | null
}

/**
 * Declarative infrastructure the controller drives. `apply` converges on the
 * requested state and must be safe to repeat; failures are thrown verbatim.
 */
export interface ProvisioningBackend {
  inspect(): VmLifecycle
  /** True while the state store still records any resource, domain or not. */
  hasResources(): boolean
  apply(request: ApplyRequest): void
  destroy(): void
  outputs(): Record<string, unknown>
  output(key: string): unknown
  /** Where the backend keeps its state, for recovery hints. */
  describe(): string
}

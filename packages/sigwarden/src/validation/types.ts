import type { PackageIdentity, Registry, SigningConfiguration } from '../types.js'

/** Input to {@link SignatureValidation.validate}. */
export interface ValidateRequest {
  registry: Registry
  package: PackageIdentity
  version: string
  /** Bytes of the downloaded source archive the signature covers. */
  content: Uint8Array
  /** Effective signing configuration for this registry and package. */
  configuration: SigningConfiguration
  /**
   * Time budget hint in milliseconds, forwarded to the metadata provider and
   * the verifier. Not enforced by the pipeline itself.
   */
  timeoutMs?: number | undefined
}

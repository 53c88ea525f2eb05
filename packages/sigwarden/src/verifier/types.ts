/**
 * Types for the verifier boundary: the configuration handed to the external
 * signature verifier and the verifier itself.
 */

import type { CollaboratorOptions, SignatureFormat, SignatureStatus } from '../types.js'

/** Certificate expiration policy applied by the verifier. */
export type CertificateExpirationPolicy =
  | {
      mode: 'enabled'
      /** Point in time to validate against; the verifier uses "now" when omitted. */
      validationTime?: Date | undefined
    }
  | { mode: 'disabled' }

/** Certificate revocation policy applied by the verifier. */
export type CertificateRevocationPolicy = 'strict' | 'allowSoftFail' | 'disabled'

/**
 * Concrete settings for one verification. Built fresh for every validation
 * call and never shared between calls.
 */
export interface VerifierConfiguration {
  /** Raw trust anchor certificates, in the order they were listed on disk. */
  trustedRoots: Uint8Array[]
  /** Whether the verifier's built-in trust store is consulted as well. */
  includeDefaultTrustStore: boolean
  certificateExpiration: CertificateExpirationPolicy
  certificateRevocation: CertificateRevocationPolicy
}

/** Input to one signature verification. */
export interface VerificationRequest {
  signature: Uint8Array
  content: Uint8Array
  format: SignatureFormat
  configuration: VerifierConfiguration
}

/**
 * Cryptographic signature verifier. Classifies a signature rather than
 * throwing for verification failures; a rejected promise means the verifier
 * itself could not run.
 */
export interface SignatureVerifier {
  verify(request: VerificationRequest, options?: CollaboratorOptions): Promise<SignatureStatus>
}

/** Read-only filesystem access needed to load trust roots. */
export interface TrustRootFileSystem {
  /** Resolve `true` if `path` exists and is a directory. */
  isDirectory(path: string): Promise<boolean>
  /** List entry names in `path`, in the order the filesystem returns them. */
  readDirectory(path: string): Promise<string[]>
  /** Read the whole file at `path`. */
  readFile(path: string): Promise<Uint8Array>
}

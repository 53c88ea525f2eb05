/**
 * Verifier configuration barrel export.
 */

export type {
  CertificateExpirationPolicy,
  CertificateRevocationPolicy,
  VerifierConfiguration,
  VerificationRequest,
  SignatureVerifier,
  TrustRootFileSystem,
} from './types.js'

export { nodeFileSystem } from './filesystem.js'
export {
  buildVerifierConfiguration,
  defaultVerifierConfiguration,
  loadTrustedRoots,
} from './configuration.js'

/**
 * Error hierarchy for sigwarden.
 *
 * @packageDocumentation
 */

import { describeSigningEntity, formatRelease } from './release.js'
import type { PackageIdentity, Registry, ReleaseRef, SigningEntity } from './types.js'

/** Base error for all sigwarden errors. */
export class SigningError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'SigningError'
  }
}

/**
 * Base for errors tied to one release. Carries the registry, package and
 * version so callers can report the failure without re-deriving state.
 */
export class ReleaseError extends SigningError {
  readonly registry: Registry
  readonly package: PackageIdentity
  readonly version: string

  constructor(message: string, release: ReleaseRef, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ReleaseError'
    this.registry = release.registry
    this.package = release.package
    this.version = release.version
  }
}

// --- Retrieval Failures ---

/**
 * Thrown when release metadata could not be fetched. The provider's error is
 * available as `cause`.
 */
export class MetadataRetrievalError extends ReleaseError {
  constructor(release: ReleaseRef, cause: unknown) {
    super(
      `failed retrieving source archive signature for ${formatRelease(release)}: ${causeMessage(cause)}`,
      release,
      { cause },
    )
    this.name = 'MetadataRetrievalError'
  }
}

// --- Decode Failures ---

/** Thrown when release metadata lists no source archive resource. */
export class MissingSourceArchiveError extends ReleaseError {
  constructor(release: ReleaseRef) {
    super(`missing source archive for ${formatRelease(release)}`, release)
    this.name = 'MissingSourceArchiveError'
  }
}

/**
 * Raised when the source archive carries no signature. The orchestrator routes
 * this to the `onUnsigned` policy; it only reaches callers when that policy
 * rejects the release.
 */
export class SourceArchiveNotSignedError extends ReleaseError {
  constructor(release: ReleaseRef) {
    super(`${formatRelease(release)} is not signed`, release)
    this.name = 'SourceArchiveNotSignedError'
  }
}

/** Thrown when the signature payload is not valid base64. */
export class MalformedSignatureError extends ReleaseError {
  constructor(release: ReleaseRef) {
    super(`failed loading signature for ${formatRelease(release)}: not valid base64`, release)
    this.name = 'MalformedSignatureError'
  }
}

/** Thrown when a signature is present but its format token is not. */
export class MissingSignatureFormatError extends ReleaseError {
  constructor(release: ReleaseRef) {
    super(`missing signature format for ${formatRelease(release)}`, release)
    this.name = 'MissingSignatureFormatError'
  }
}

/** Thrown when the signature format token is not one the verifier supports. */
export class UnknownSignatureFormatError extends ReleaseError {
  /** The unrecognized token as it appeared in the metadata. */
  readonly format: string

  constructor(release: ReleaseRef, format: string) {
    super(`unknown signature format '${format}' for ${formatRelease(release)}`, release)
    this.name = 'UnknownSignatureFormatError'
    this.format = format
  }
}

// --- Verification Failures ---

/** Thrown when the signature does not match the content. */
export class InvalidSignatureError extends ReleaseError {
  readonly reason: string

  constructor(release: ReleaseRef, reason: string) {
    super(`invalid signature for ${formatRelease(release)}: ${reason}`, release)
    this.name = 'InvalidSignatureError'
    this.reason = reason
  }
}

/** Thrown when the signing certificate is itself invalid (malformed, expired, revoked). */
export class InvalidSigningCertificateError extends ReleaseError {
  readonly reason: string

  constructor(release: ReleaseRef, reason: string) {
    super(`invalid signing certificate for ${formatRelease(release)}: ${reason}`, release)
    this.name = 'InvalidSigningCertificateError'
    this.reason = reason
  }
}

/** Thrown when the verifier could not be invoked or failed internally. */
export class SignatureVerificationFailedError extends ReleaseError {
  constructor(release: ReleaseRef, cause: unknown) {
    super(
      `failed to validate signature for ${formatRelease(release)}: ${causeMessage(cause)}`,
      release,
      { cause },
    )
    this.name = 'SignatureVerificationFailedError'
  }
}

// --- Trust Failures ---

/**
 * Thrown when the signing certificate does not chain to a trusted root and the
 * `onUntrustedCertificate` policy rejects the release.
 */
export class SignerNotTrustedError extends ReleaseError {
  /** The entity named by the untrusted certificate. */
  readonly signingEntity: SigningEntity

  constructor(release: ReleaseRef, signingEntity: SigningEntity) {
    super(
      `${formatRelease(release)} signer not trusted: ${describeSigningEntity(signingEntity)}`,
      release,
    )
    this.name = 'SignerNotTrustedError'
    this.signingEntity = signingEntity
  }
}

/**
 * Thrown when the delegate asked to decide on an unsigned or untrusted release
 * fails instead of answering. The delegate's error is available as `cause`.
 */
export class DelegateDecisionError extends ReleaseError {
  constructor(release: ReleaseRef, cause: unknown) {
    super(
      `no trust decision for ${formatRelease(release)}: ${causeMessage(cause)}`,
      release,
      { cause },
    )
    this.name = 'DelegateDecisionError'
  }
}

// --- Configuration Failures ---

/** Thrown when a required configuration key is absent. */
export class MissingConfigurationError extends SigningError {
  /** Dotted path of the missing key, e.g. `security.signing.onUnsigned`. */
  readonly details: string

  constructor(details: string) {
    super(`missing configuration: ${details}`)
    this.name = 'MissingConfigurationError'
    this.details = details
  }
}

/** Thrown when configuration is present but unusable. */
export class BadConfigurationError extends SigningError {
  readonly details: string

  /** Filesystem path involved in the failure, if any. */
  readonly path: string | undefined

  constructor(details: string, path?: string, options?: ErrorOptions) {
    super(`bad configuration: ${details}`, options)
    this.name = 'BadConfigurationError'
    this.details = details
    this.path = path
  }
}

function causeMessage(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}

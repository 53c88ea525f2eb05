/**
 * Shared types and interfaces for sigwarden.
 */

/** A package registry, identified by its base URL. */
export interface Registry {
  /** Base URL of the registry (e.g. `https://packages.example.com`). */
  url: string
}

/** Registry-scoped package identity, rendered as `scope.name`. */
export interface PackageIdentity {
  /** Registry scope the package is published under. */
  scope: string
  /** Package name within the scope. */
  name: string
}

/** A specific release of a package on a specific registry. */
export interface ReleaseRef {
  registry: Registry
  package: PackageIdentity
  version: string
}

/**
 * Identity of whoever produced a signature, as extracted from the signing
 * certificate by the verifier.
 *
 * `recognized` entities come from a certificate issued under a known program;
 * everything else is `unrecognized` and carries whatever subject fields the
 * certificate had.
 */
export type SigningEntity =
  | {
      kind: 'recognized'
      /** Certificate program the entity belongs to. */
      type: 'adp'
      name: string
      organizationalUnit: string
      organization: string
    }
  | {
      kind: 'unrecognized'
      name?: string | undefined
      organizationalUnit?: string | undefined
      organization?: string | undefined
    }

/** Signature encodings understood by the verifier. */
export type SignatureFormat = 'cms-1.0.0'

/**
 * Outcome of one signature verification, produced by the external verifier.
 */
export type SignatureStatus =
  | { status: 'valid'; signingEntity: SigningEntity }
  | { status: 'invalid'; reason: string }
  | { status: 'certificateInvalid'; reason: string }
  | { status: 'certificateNotTrusted'; signingEntity: SigningEntity }

/** Administrator-configured reaction to an unsigned or untrusted release. */
export type SigningAction = 'prompt' | 'error' | 'warn' | 'silentAllow'

/** Certificate expiration check setting as written in registry configuration. */
export type CertificateExpirationCheck = 'enabled' | 'disabled'

/** Certificate revocation check setting. */
export type CertificateRevocationCheck = 'strict' | 'allowSoftFail' | 'disabled'

/**
 * Signing section of a registry's security configuration.
 *
 * Every field is optional: an absent action is a configuration error when the
 * pipeline needs it, and absent verifier settings fall back to the verifier's
 * defaults.
 */
export interface SigningConfiguration {
  /** What to do when the release carries no signature. */
  onUnsigned?: SigningAction | undefined
  /** What to do when the signing certificate does not chain to a trusted root. */
  onUntrustedCertificate?: SigningAction | undefined
  /** Absolute path to a directory of trusted root certificates. */
  trustedRootCertificatesPath?: string | undefined
  /** Whether the verifier's built-in trust store is also consulted. */
  includeDefaultTrustedRootCertificates?: boolean | undefined
  validationChecks?:
    | {
        certificateExpiration?: CertificateExpirationCheck | undefined
        certificateRevocation?: CertificateRevocationCheck | undefined
      }
    | undefined
}

/** Signature attached to a release resource. */
export interface ResourceSigning {
  /** Base64 (standard alphabet, padded) signature bytes. */
  signatureBase64Encoded?: string | undefined
  /** Signature format token, e.g. `cms-1.0.0`. */
  signatureFormat?: string | undefined
}

/** A downloadable resource listed in release metadata. */
export interface ReleaseResource {
  /** Resource name; the source archive is named `source-archive`. */
  name: string
  /** Media type of the resource. */
  type: string
  /** Hex checksum of the resource, when the registry publishes one. */
  checksum?: string | undefined
  signing?: ResourceSigning | undefined
}

/** Release metadata as returned by the registry. */
export interface ReleaseMetadata {
  id?: string | undefined
  version: string
  resources: ReleaseResource[]
}

/** Options forwarded to collaborators that may honour a time budget. */
export interface CollaboratorOptions {
  /**
   * Suggested time budget in milliseconds. The orchestrator does not enforce
   * it; collaborators decide whether to honour it.
   */
  timeoutMs?: number | undefined
}

/** Fetches release metadata from a registry. */
export interface ReleaseMetadataProvider {
  getMetadata(
    pkg: PackageIdentity,
    version: string,
    options?: CollaboratorOptions,
  ): Promise<ReleaseMetadata>
}

/** Severity of a validation observation. */
export type ObservationSeverity = 'info' | 'warning'

/** A diagnostic emitted while validating a release. */
export interface ValidationEvent {
  severity: ObservationSeverity
  message: string
  release: ReleaseRef
}

/** Receives diagnostics emitted during validation. */
export interface ValidationObserver {
  emit(event: ValidationEvent): void
}

/** Request passed to the prior-trust ledger once a trust decision exists. */
export interface ReconcileRequest {
  registry: Registry
  package: PackageIdentity
  version: string
  /** The identity the current call settled on, or `null` when none. */
  signingEntity: SigningEntity | null
}

/**
 * Trust-on-first-use ledger of signing entities per package.
 *
 * The ledger keeps its own bookkeeping and synchronisation; its answer never
 * changes the outcome of the validation call that reported to it.
 */
export interface SigningEntityLedger {
  reconcile(request: ReconcileRequest): Promise<unknown>
}

/**
 * Decides whether to continue with an unsigned or untrusted release.
 *
 * Each method is called at most once per decision and resolves `true` to
 * continue despite the concern.
 */
export interface SignatureValidationDelegate {
  decideUnsigned(registry: Registry, pkg: PackageIdentity, version: string): Promise<boolean>
  decideUntrusted(registry: Registry, pkg: PackageIdentity, version: string): Promise<boolean>
}

/**
 * SignatureValidation: the release signature validation pipeline.
 *
 * Order of operations for one call:
 *
 *   fetch metadata → decode signature → build verifier configuration →
 *   verify → apply trust policy → reconcile with the ledger → settle
 *
 * Decode and verify are skipped for unsigned releases; the policy step is
 * skipped when the signature is valid and trusted. Once a trust decision
 * exists (accepting or rejecting), the ledger is told about it before the call
 * settles. Failures that happen before a trust decision never reach the
 * ledger.
 */

import {
  InvalidSignatureError,
  InvalidSigningCertificateError,
  MetadataRetrievalError,
  SignatureVerificationFailedError,
  SignerNotTrustedError,
  SourceArchiveNotSignedError,
} from '../errors.js'
import { TrustPolicyEngine } from '../policy/engine.js'
import { describeSigningEntity, formatRelease } from '../release.js'
import { decodeSignature } from '../signing/decoder.js'
import type { DecodedSignature } from '../signing/decoder.js'
import type {
  ReleaseMetadata,
  ReleaseMetadataProvider,
  ReleaseRef,
  SignatureStatus,
  SignatureValidationDelegate,
  SigningEntity,
  SigningEntityLedger,
  ValidationObserver,
} from '../types.js'
import { buildVerifierConfiguration } from '../verifier/configuration.js'
import { nodeFileSystem } from '../verifier/filesystem.js'
import type { SignatureVerifier, TrustRootFileSystem } from '../verifier/types.js'
import type { ValidateRequest } from './types.js'

/** Collaborators for a {@link SignatureValidation}. */
export interface SignatureValidationOptions {
  metadataProvider: ReleaseMetadataProvider
  verifier: SignatureVerifier
  ledger: SigningEntityLedger
  /** Answers `prompt` actions. Required only if a registry configures `prompt`. */
  delegate?: SignatureValidationDelegate | undefined
  /** Filesystem for trust roots. Defaults to the local disk. */
  fileSystem?: TrustRootFileSystem | undefined
  /** Receives info and warning observations. Observations are dropped when omitted. */
  observer?: ValidationObserver | undefined
}

/**
 * The trust decision reached for a call: either an identity (possibly none)
 * to report, or the rejection the policy produced.
 */
type TrustOutcome =
  | { accepted: true; signingEntity: SigningEntity | null }
  | { accepted: false; error: Error }

const SILENT_OBSERVER: ValidationObserver = {
  emit: () => undefined,
}

/**
 * Validates the signature of a package release and reconciles the signer
 * with the prior-trust ledger.
 *
 * Instances hold no per-call state; concurrent `validate` calls are
 * independent.
 */
export class SignatureValidation {
  readonly #metadataProvider: ReleaseMetadataProvider
  readonly #verifier: SignatureVerifier
  readonly #ledger: SigningEntityLedger
  readonly #fileSystem: TrustRootFileSystem
  readonly #observer: ValidationObserver
  readonly #policy: TrustPolicyEngine

  constructor(options: SignatureValidationOptions) {
    this.#metadataProvider = options.metadataProvider
    this.#verifier = options.verifier
    this.#ledger = options.ledger
    this.#fileSystem = options.fileSystem ?? nodeFileSystem
    this.#observer = options.observer ?? SILENT_OBSERVER
    this.#policy = new TrustPolicyEngine({
      delegate: options.delegate,
      observer: this.#observer,
    })
  }

  /**
   * Validate one release.
   *
   * @returns The verified signing entity, or `null` when the release was
   * accepted without a trusted identity (unsigned or untrusted, but allowed).
   * @throws A `SigningError` subclass describing why the release was rejected.
   */
  async validate(request: ValidateRequest): Promise<SigningEntity | null> {
    const release: ReleaseRef = {
      registry: request.registry,
      package: request.package,
      version: request.version,
    }

    const outcome = await this.#decideTrust(request, release)

    // The ledger's answer is bookkeeping only; it never changes this result.
    try {
      await this.#ledger.reconcile({
        ...release,
        signingEntity: outcome.accepted ? outcome.signingEntity : null,
      })
    } catch (err) {
      this.#observer.emit({
        severity: 'warning',
        message: `signing entity check for ${formatRelease(release)} failed: ${err instanceof Error ? err.message : String(err)}`,
        release,
      })
    }

    if (!outcome.accepted) {
      throw outcome.error
    }
    return outcome.signingEntity
  }

  /**
   * Run every step up to and including the trust policy. Errors thrown from
   * here are hard failures that skip reconciliation; policy rejections are
   * returned as an outcome instead.
   */
  async #decideTrust(request: ValidateRequest, release: ReleaseRef): Promise<TrustOutcome> {
    const metadata = await this.#fetchMetadata(request, release)

    let decoded: DecodedSignature
    try {
      decoded = decodeSignature(metadata, release)
    } catch (err) {
      if (!(err instanceof SourceArchiveNotSignedError)) {
        throw err
      }
      this.#observer.emit({
        severity: 'info',
        message: `${formatRelease(release)} is unsigned`,
        release,
      })
      return this.#settlePolicy(this.#policy.resolveUnsigned(release, request.configuration))
    }

    const configuration = await buildVerifierConfiguration(request.configuration, this.#fileSystem)

    let status: SignatureStatus
    try {
      status = await this.#verifier.verify(
        {
          signature: decoded.signature,
          content: request.content,
          format: decoded.format,
          configuration,
        },
        { timeoutMs: request.timeoutMs },
      )
    } catch (err) {
      throw new SignatureVerificationFailedError(release, err)
    }

    switch (status.status) {
      case 'valid':
        this.#observer.emit({
          severity: 'info',
          message: `${formatRelease(release)} is signed with a valid entity '${describeSigningEntity(status.signingEntity)}'`,
          release,
        })
        return { accepted: true, signingEntity: status.signingEntity }
      case 'invalid':
        throw new InvalidSignatureError(release, status.reason)
      case 'certificateInvalid':
        throw new InvalidSigningCertificateError(release, status.reason)
      case 'certificateNotTrusted':
        this.#observer.emit({
          severity: 'info',
          message: `${formatRelease(release)} signing entity '${describeSigningEntity(status.signingEntity)}' is untrusted`,
          release,
        })
        return this.#settlePolicy(
          this.#policy.resolveUntrusted(release, request.configuration, status.signingEntity),
        )
    }
  }

  async #fetchMetadata(request: ValidateRequest, release: ReleaseRef): Promise<ReleaseMetadata> {
    try {
      return await this.#metadataProvider.getMetadata(request.package, request.version, {
        timeoutMs: request.timeoutMs,
      })
    } catch (err) {
      throw new MetadataRetrievalError(release, err)
    }
  }

  /**
   * Turn a policy verdict into an outcome. Trust rejections become outcomes
   * so they are reconciled; configuration errors propagate as hard failures.
   */
  async #settlePolicy(verdict: Promise<null>): Promise<TrustOutcome> {
    try {
      return { accepted: true, signingEntity: await verdict }
    } catch (err) {
      if (err instanceof SourceArchiveNotSignedError || err instanceof SignerNotTrustedError) {
        return { accepted: false, error: err }
      }
      throw err
    }
  }
}

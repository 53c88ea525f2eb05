/**
 * Trust policy engine: applies a registry's `onUnsigned` and
 * `onUntrustedCertificate` actions, consulting the delegate when the action is
 * `prompt`.
 *
 * Every accepting path resolves to `null`. An untrusted signer is never passed
 * on as an identity, even when the delegate lets the release through.
 */

import {
  BadConfigurationError,
  DelegateDecisionError,
  MissingConfigurationError,
  SignerNotTrustedError,
  SourceArchiveNotSignedError,
} from '../errors.js'
import type {
  ReleaseRef,
  SignatureValidationDelegate,
  SigningAction,
  SigningConfiguration,
  SigningEntity,
  ValidationObserver,
} from '../types.js'
import { actionConfigKey, decideTrustAction } from './decision.js'
import type { TrustFailure } from './decision.js'

/** Options for constructing a {@link TrustPolicyEngine}. */
export interface TrustPolicyEngineOptions {
  /** Answers `prompt` actions. Without one, `prompt` is a configuration error. */
  delegate?: SignatureValidationDelegate | undefined
  /** Receives the warning emitted by `warn` actions. */
  observer?: ValidationObserver | undefined
}

export class TrustPolicyEngine {
  readonly #delegate: SignatureValidationDelegate | undefined
  readonly #observer: ValidationObserver | undefined

  constructor(options: TrustPolicyEngineOptions = {}) {
    this.#delegate = options.delegate
    this.#observer = options.observer
  }

  /**
   * Apply `onUnsigned` to a release whose source archive carries no signature.
   *
   * @returns `null` when the release is accepted.
   * @throws {@link SourceArchiveNotSignedError} when the policy or delegate rejects it.
   * @throws {@link MissingConfigurationError} when `onUnsigned` is not configured.
   * @throws {@link DelegateDecisionError} when the delegate fails to answer.
   */
  resolveUnsigned(release: ReleaseRef, signing: SigningConfiguration): Promise<null> {
    return this.#resolve({ kind: 'unsigned' }, signing.onUnsigned, release)
  }

  /**
   * Apply `onUntrustedCertificate` to a release signed by an untrusted certificate.
   *
   * @returns `null` when the release is accepted.
   * @throws {@link SignerNotTrustedError} when the policy or delegate rejects it.
   * @throws {@link MissingConfigurationError} when `onUntrustedCertificate` is not configured.
   * @throws {@link DelegateDecisionError} when the delegate fails to answer.
   */
  resolveUntrusted(
    release: ReleaseRef,
    signing: SigningConfiguration,
    signingEntity: SigningEntity,
  ): Promise<null> {
    return this.#resolve(
      { kind: 'untrusted', signingEntity },
      signing.onUntrustedCertificate,
      release,
    )
  }

  async #resolve(
    failure: TrustFailure,
    action: SigningAction | undefined,
    release: ReleaseRef,
  ): Promise<null> {
    if (action === undefined) {
      throw new MissingConfigurationError(actionConfigKey(failure))
    }

    const rejection =
      failure.kind === 'unsigned'
        ? new SourceArchiveNotSignedError(release)
        : new SignerNotTrustedError(release, failure.signingEntity)

    switch (decideTrustAction(action)) {
      case 'ask': {
        const proceed = await this.#ask(failure, release)
        if (!proceed) {
          throw rejection
        }
        return null
      }
      case 'reject':
        throw rejection
      case 'warn':
        this.#observer?.emit({ severity: 'warning', message: rejection.message, release })
        return null
      case 'accept':
        return null
    }
  }

  async #ask(failure: TrustFailure, release: ReleaseRef): Promise<boolean> {
    const delegate = this.#delegate
    if (delegate === undefined) {
      throw new BadConfigurationError(
        `${actionConfigKey(failure)} is 'prompt' but no delegate is connected to answer it`,
      )
    }
    try {
      return failure.kind === 'unsigned'
        ? await delegate.decideUnsigned(release.registry, release.package, release.version)
        : await delegate.decideUntrusted(release.registry, release.package, release.version)
    } catch (err) {
      throw new DelegateDecisionError(release, err)
    }
  }
}

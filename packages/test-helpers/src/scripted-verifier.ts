/**
 * Signature verifier returning a scripted outcome.
 */

import type {
  CollaboratorOptions,
  SignatureStatus,
  SignatureVerifier,
  VerificationRequest,
} from 'sigwarden'

/** A recorded `verify` call. */
export interface RecordedVerification {
  request: VerificationRequest
  options: CollaboratorOptions | undefined
}

/**
 * A verifier that answers every call with the same status, or rejects with a
 * fixed error.
 *
 * @public
 */
export class ScriptedVerifier implements SignatureVerifier {
  readonly #outcome: SignatureStatus | Error
  readonly #calls: RecordedVerification[] = []

  constructor(outcome: SignatureStatus | Error) {
    this.#outcome = outcome
  }

  verify(request: VerificationRequest, options?: CollaboratorOptions): Promise<SignatureStatus> {
    this.#calls.push({ request, options })
    if (this.#outcome instanceof Error) {
      return Promise.reject(this.#outcome)
    }
    return Promise.resolve(this.#outcome)
  }

  /** Every call received, in call order. */
  get calls(): readonly RecordedVerification[] {
    return this.#calls
  }
}

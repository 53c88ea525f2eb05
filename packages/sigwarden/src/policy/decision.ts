import type { SigningAction, SigningEntity } from '../types.js'

/** The two trust concerns a registry configures an action for. */
export type TrustFailure =
  | { kind: 'unsigned' }
  | { kind: 'untrusted'; signingEntity: SigningEntity }

/**
 * What the policy engine does with a trust failure.
 *
 * - `ask`: defer to the delegate
 * - `reject`: fail with the failure's error
 * - `warn`: emit a warning and accept without an identity
 * - `accept`: accept without an identity, silently
 */
export type TrustDecision = 'ask' | 'reject' | 'warn' | 'accept'

/** Map a configured action to a decision. The table is the same for both failure kinds. */
export function decideTrustAction(action: SigningAction): TrustDecision {
  switch (action) {
    case 'prompt':
      return 'ask'
    case 'error':
      return 'reject'
    case 'warn':
      return 'warn'
    case 'silentAllow':
      return 'accept'
  }
}

/** Dotted configuration key holding the action for `failure`. */
export function actionConfigKey(failure: TrustFailure): string {
  return failure.kind === 'unsigned'
    ? 'security.signing.onUnsigned'
    : 'security.signing.onUntrustedCertificate'
}

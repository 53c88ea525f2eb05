/**
 * Trust policy barrel export.
 */

export type { TrustFailure, TrustDecision } from './decision.js'
export { decideTrustAction, actionConfigKey } from './decision.js'
export { TrustPolicyEngine } from './engine.js'
export type { TrustPolicyEngineOptions } from './engine.js'

/**
 * Validation pipeline barrel export.
 */

export { SignatureValidation } from './signature-validation.js'
export type { SignatureValidationOptions } from './signature-validation.js'
export type { ValidateRequest } from './types.js'

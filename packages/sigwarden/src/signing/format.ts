import type { SignatureFormat } from '../types.js'

/** Every signature format token the verifier accepts. */
export const SIGNATURE_FORMATS: readonly SignatureFormat[] = ['cms-1.0.0']

/**
 * Map a format token from release metadata to a {@link SignatureFormat}.
 *
 * @returns `undefined` for tokens that name no supported format.
 */
export function parseSignatureFormat(token: string): SignatureFormat | undefined {
  return SIGNATURE_FORMATS.find((format) => format === token)
}

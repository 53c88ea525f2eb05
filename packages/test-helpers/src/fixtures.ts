/**
 * Canned registries, packages and release metadata.
 */

import type { PackageIdentity, Registry, ReleaseMetadata, SigningEntity } from 'sigwarden'

/** @public */
export const TEST_REGISTRY: Registry = { url: 'https://packages.example.com' }

/** @public */
export const TEST_PACKAGE: PackageIdentity = { scope: 'acme', name: 'widgets' }

/** @public */
export const TEST_VERSION = '1.2.0'

/** Base64 of the bytes `test-signature`. */
export const TEST_SIGNATURE_BASE64 = 'dGVzdC1zaWduYXR1cmU='

/** @public */
export const TEST_SIGNER: SigningEntity = {
  kind: 'unrecognized',
  name: 'Test Signer',
  organization: 'Acme Test Org',
}

/** Options for {@link releaseMetadata}. */
export interface ReleaseMetadataOptions {
  version?: string
  /** Omit the source archive resource entirely. */
  withoutSourceArchive?: boolean
  /** Signature to attach; `null` leaves the archive unsigned. */
  signatureBase64Encoded?: string | null
  /** Format token; `null` omits it. */
  signatureFormat?: string | null
}

/**
 * Build release metadata with a signed `cms-1.0.0` source archive unless the
 * options say otherwise.
 *
 * @public
 */
export function releaseMetadata(options: ReleaseMetadataOptions = {}): ReleaseMetadata {
  const version = options.version ?? TEST_VERSION
  if (options.withoutSourceArchive === true) {
    return { version, resources: [] }
  }

  const signature =
    options.signatureBase64Encoded === undefined
      ? TEST_SIGNATURE_BASE64
      : options.signatureBase64Encoded
  const format = options.signatureFormat === undefined ? 'cms-1.0.0' : options.signatureFormat

  return {
    id: `${TEST_PACKAGE.scope}.${TEST_PACKAGE.name}`,
    version,
    resources: [
      {
        name: 'source-archive',
        type: 'application/zip',
        checksum: 'a1b2c3',
        signing:
          signature === null
            ? undefined
            : {
                signatureBase64Encoded: signature,
                signatureFormat: format ?? undefined,
              },
      },
    ],
  }
}

/**
 * Extraction of the source archive signature from release metadata.
 *
 * The checks run in a fixed order so that a harder failure (no source archive)
 * always wins over a softer one (archive present but unsigned).
 */

import {
  MalformedSignatureError,
  MissingSignatureFormatError,
  MissingSourceArchiveError,
  SourceArchiveNotSignedError,
  UnknownSignatureFormatError,
} from '../errors.js'
import type { ReleaseMetadata, ReleaseRef, ReleaseResource, SignatureFormat } from '../types.js'
import { parseSignatureFormat } from './format.js'

/** Resource name of the source archive in release metadata. */
export const SOURCE_ARCHIVE_NAME = 'source-archive'

/** Media type of the source archive in release metadata. */
export const SOURCE_ARCHIVE_TYPE = 'application/zip'

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/

/** A signature ready to hand to the verifier. */
export interface DecodedSignature {
  signature: Uint8Array
  format: SignatureFormat
}

/** Find the source archive resource, if the metadata lists one. */
export function findSourceArchive(metadata: ReleaseMetadata): ReleaseResource | undefined {
  return metadata.resources.find(
    (resource) => resource.name === SOURCE_ARCHIVE_NAME && resource.type === SOURCE_ARCHIVE_TYPE,
  )
}

/**
 * Strictly decode standard, padded base64. Whitespace, the URL-safe alphabet
 * and missing padding are all rejected.
 *
 * An empty string is rejected as well, so an empty signature field never
 * reaches the verifier as zero bytes.
 *
 * @returns `undefined` when the input is empty or not valid base64.
 */
export function decodeBase64Strict(encoded: string): Uint8Array | undefined {
  if (encoded.length === 0 || !BASE64_PATTERN.test(encoded)) {
    return undefined
  }
  return new Uint8Array(Buffer.from(encoded, 'base64'))
}

/**
 * Extract signature bytes and format for the source archive of `release`.
 *
 * @throws {@link MissingSourceArchiveError} if there is no source archive
 * @throws {@link SourceArchiveNotSignedError} if the archive carries no signature
 * @throws {@link MalformedSignatureError} if the signature is not valid base64
 * @throws {@link MissingSignatureFormatError} if the format token is absent
 * @throws {@link UnknownSignatureFormatError} if the format token is not supported
 */
export function decodeSignature(metadata: ReleaseMetadata, release: ReleaseRef): DecodedSignature {
  const sourceArchive = findSourceArchive(metadata)
  if (sourceArchive === undefined) {
    throw new MissingSourceArchiveError(release)
  }

  const encoded = sourceArchive.signing?.signatureBase64Encoded
  if (encoded === undefined) {
    throw new SourceArchiveNotSignedError(release)
  }

  const signature = decodeBase64Strict(encoded)
  if (signature === undefined) {
    throw new MalformedSignatureError(release)
  }

  const token = sourceArchive.signing?.signatureFormat
  if (token === undefined) {
    throw new MissingSignatureFormatError(release)
  }

  const format = parseSignatureFormat(token)
  if (format === undefined) {
    throw new UnknownSignatureFormatError(release, token)
  }

  return { signature, format }
}

/**
 * Signature decoding barrel export.
 */

export { SIGNATURE_FORMATS, parseSignatureFormat } from './format.js'
export {
  SOURCE_ARCHIVE_NAME,
  SOURCE_ARCHIVE_TYPE,
  findSourceArchive,
  decodeBase64Strict,
  decodeSignature,
} from './decoder.js'
export type { DecodedSignature } from './decoder.js'

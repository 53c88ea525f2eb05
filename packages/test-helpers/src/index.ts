/**
 * @sigwarden/test-helpers: test utilities for sigwarden consumers.
 *
 * @packageDocumentation
 */

export { InMemoryLedger } from './in-memory-ledger.js'
export type { LedgerVerdict } from './in-memory-ledger.js'
export { StaticMetadataProvider } from './static-metadata-provider.js'
export type { MetadataRequest } from './static-metadata-provider.js'
export { ScriptedVerifier } from './scripted-verifier.js'
export type { RecordedVerification } from './scripted-verifier.js'
export { RecordingObserver } from './recording-observer.js'
export { ScriptedDelegate } from './scripted-delegate.js'
export type { DelegateCall, DelegateQuestion } from './scripted-delegate.js'
export { InMemoryFileSystem } from './in-memory-file-system.js'
export {
  TEST_REGISTRY,
  TEST_PACKAGE,
  TEST_VERSION,
  TEST_SIGNATURE_BASE64,
  TEST_SIGNER,
  releaseMetadata,
} from './fixtures.js'
export type { ReleaseMetadataOptions } from './fixtures.js'

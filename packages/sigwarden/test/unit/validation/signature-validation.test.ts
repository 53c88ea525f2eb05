import { describe, it, expect, vi } from 'vitest'
import {
  InMemoryFileSystem,
  InMemoryLedger,
  RecordingObserver,
  ScriptedDelegate,
  ScriptedVerifier,
  StaticMetadataProvider,
  TEST_PACKAGE,
  TEST_REGISTRY,
  TEST_SIGNER,
  TEST_VERSION,
  releaseMetadata,
} from '@sigwarden/test-helpers'
import type { ReleaseMetadataOptions } from '@sigwarden/test-helpers'
import { SignatureValidation } from '../../../src/validation/signature-validation.js'
import {
  BadConfigurationError,
  DelegateDecisionError,
  InvalidSignatureError,
  InvalidSigningCertificateError,
  MetadataRetrievalError,
  MissingConfigurationError,
  MissingSourceArchiveError,
  SignatureVerificationFailedError,
  SignerNotTrustedError,
  SourceArchiveNotSignedError,
  UnknownSignatureFormatError,
} from '../../../src/errors.js'
import type {
  SignatureStatus,
  SignatureValidationDelegate,
  SigningAction,
  SigningConfiguration,
} from '../../../src/types.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const CONTENT = new TextEncoder().encode('archive bytes')

interface HarnessOptions {
  metadata?: ReleaseMetadataOptions
  status?: SignatureStatus | Error
  delegate?: SignatureValidationDelegate
  fileSystem?: InMemoryFileSystem
}

function harness(options: HarnessOptions = {}) {
  const metadataProvider = new StaticMetadataProvider().add(
    TEST_PACKAGE,
    TEST_VERSION,
    releaseMetadata(options.metadata),
  )
  const verifier = new ScriptedVerifier(
    options.status ?? { status: 'valid', signingEntity: TEST_SIGNER },
  )
  const ledger = new InMemoryLedger()
  const observer = new RecordingObserver()
  const validation = new SignatureValidation({
    metadataProvider,
    verifier,
    ledger,
    observer,
    delegate: options.delegate,
    fileSystem: options.fileSystem ?? new InMemoryFileSystem(),
  })
  return { metadataProvider, verifier, ledger, observer, validation }
}

function validate(
  validation: SignatureValidation,
  configuration: SigningConfiguration,
  timeoutMs?: number,
) {
  return validation.validate({
    registry: TEST_REGISTRY,
    package: TEST_PACKAGE,
    version: TEST_VERSION,
    content: CONTENT,
    configuration,
    timeoutMs,
  })
}

const UNSIGNED: ReleaseMetadataOptions = { signatureBase64Encoded: null }
const UNTRUSTED: SignatureStatus = { status: 'certificateNotTrusted', signingEntity: TEST_SIGNER }

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('SignatureValidation', () => {
  describe('valid signatures', () => {
    it('should return the signing entity and reconcile it once', async () => {
      const { validation, ledger, verifier, observer } = harness()

      const result = await validate(validation, {})

      expect(result).toEqual(TEST_SIGNER)
      expect(verifier.calls).toHaveLength(1)
      expect(ledger.calls).toEqual([
        {
          registry: TEST_REGISTRY,
          package: TEST_PACKAGE,
          version: TEST_VERSION,
          signingEntity: TEST_SIGNER,
        },
      ])
      expect(observer.messages('info')).toEqual([
        "acme.widgets 1.2.0 from https://packages.example.com is signed with a valid entity 'Test Signer, Acme Test Org'",
      ])
    })

    it('should not consult the trust policy', async () => {
      const delegate = new ScriptedDelegate({ unsigned: true, untrusted: true })
      const { validation } = harness({ delegate })
      await validate(validation, {})
      expect(delegate.calls).toHaveLength(0)
    })

    it('should hand signature, content, format and verifier configuration to the verifier', async () => {
      const fileSystem = new InMemoryFileSystem().addFile('/etc/roots/a.cer', 'root-a')
      const { validation, verifier } = harness({ fileSystem })

      await validate(
        validation,
        {
          trustedRootCertificatesPath: '/etc/roots',
          validationChecks: { certificateRevocation: 'allowSoftFail' },
        },
        5000,
      )

      const call = verifier.calls[0]
      expect(call?.options).toEqual({ timeoutMs: 5000 })
      expect(call?.request.format).toBe('cms-1.0.0')
      expect(call?.request.content).toBe(CONTENT)
      expect(new TextDecoder().decode(call?.request.signature)).toBe('test-signature')
      expect(call?.request.configuration.trustedRoots.map((root) => new TextDecoder().decode(root))).toEqual([
        'root-a',
      ])
      expect(call?.request.configuration.certificateRevocation).toBe('allowSoftFail')
    })

    it('should forward the timeout hint to the metadata provider', async () => {
      const { validation, metadataProvider } = harness()
      await validate(validation, {}, 250)
      expect(metadataProvider.requests[0]?.options).toEqual({ timeoutMs: 250 })
    })
  })

  describe('unsigned releases', () => {
    const cases: { action: SigningAction; answer?: boolean; accepted: boolean; warnings: number }[] = [
      { action: 'prompt', answer: true, accepted: true, warnings: 0 },
      { action: 'prompt', answer: false, accepted: false, warnings: 0 },
      { action: 'error', accepted: false, warnings: 0 },
      { action: 'warn', accepted: true, warnings: 1 },
      { action: 'silentAllow', accepted: true, warnings: 0 },
    ]

    for (const { action, answer, accepted, warnings } of cases) {
      const label = answer === undefined ? action : `${action} answered ${String(answer)}`
      it(`${label} should ${accepted ? 'accept with no identity' : 'reject'} and reconcile once`, async () => {
        const delegate = new ScriptedDelegate({ unsigned: answer ?? false })
        const { validation, ledger, verifier, observer } = harness({ metadata: UNSIGNED, delegate })

        const promise = validate(validation, { onUnsigned: action })
        if (accepted) {
          expect(await promise).toBeNull()
        } else {
          await expect(promise).rejects.toBeInstanceOf(SourceArchiveNotSignedError)
        }

        expect(verifier.calls).toHaveLength(0)
        expect(ledger.calls).toHaveLength(1)
        expect(ledger.calls[0]?.signingEntity).toBeNull()
        expect(observer.messages('warning')).toHaveLength(warnings)
        expect(delegate.calls).toHaveLength(action === 'prompt' ? 1 : 0)
      })
    }

    it('should emit an info observation that the release is unsigned', async () => {
      const { validation, observer } = harness({ metadata: UNSIGNED })
      await validate(validation, { onUnsigned: 'silentAllow' })
      expect(observer.messages('info')).toEqual([
        'acme.widgets 1.2.0 from https://packages.example.com is unsigned',
      ])
    })

    it('with warn should succeed, warn once and reconcile once with no identity', async () => {
      const { validation, ledger, observer } = harness({ metadata: UNSIGNED })

      const result = await validate(validation, { onUnsigned: 'warn' })

      expect(result).toBeNull()
      expect(observer.messages('warning')).toEqual([
        'acme.widgets 1.2.0 from https://packages.example.com is not signed',
      ])
      expect(ledger.calls).toHaveLength(1)
      expect(ledger.calls[0]?.signingEntity).toBeNull()
    })

    it('should fail with MissingConfigurationError when onUnsigned is absent', async () => {
      const { validation, ledger } = harness({ metadata: UNSIGNED })
      await expect(validate(validation, {})).rejects.toBeInstanceOf(MissingConfigurationError)
      expect(ledger.calls).toHaveLength(0)
    })

    it('should fail with BadConfigurationError for prompt without a delegate', async () => {
      const { validation, ledger } = harness({ metadata: UNSIGNED })
      await expect(validate(validation, { onUnsigned: 'prompt' })).rejects.toBeInstanceOf(
        BadConfigurationError,
      )
      expect(ledger.calls).toHaveLength(0)
    })

    it('should fail with DelegateDecisionError when the delegate fails and never reconcile', async () => {
      const { validation, ledger } = harness({
        metadata: UNSIGNED,
        delegate: {
          decideUnsigned: () => Promise.reject(new Error('not a terminal')),
          decideUntrusted: () => Promise.resolve(true),
        },
      })
      const promise = validate(validation, { onUnsigned: 'prompt' })
      await expect(promise).rejects.toBeInstanceOf(DelegateDecisionError)
      await expect(promise).rejects.toThrow(
        'no trust decision for acme.widgets 1.2.0 from https://packages.example.com: not a terminal',
      )
      expect(ledger.calls).toHaveLength(0)
    })
  })

  describe('untrusted certificates', () => {
    const cases: { action: SigningAction; answer?: boolean; accepted: boolean; warnings: number }[] = [
      { action: 'prompt', answer: true, accepted: true, warnings: 0 },
      { action: 'prompt', answer: false, accepted: false, warnings: 0 },
      { action: 'error', accepted: false, warnings: 0 },
      { action: 'warn', accepted: true, warnings: 1 },
      { action: 'silentAllow', accepted: true, warnings: 0 },
    ]

    for (const { action, answer, accepted, warnings } of cases) {
      const label = answer === undefined ? action : `${action} answered ${String(answer)}`
      it(`${label} should ${accepted ? 'accept with no identity' : 'reject'} and reconcile once`, async () => {
        const delegate = new ScriptedDelegate({ untrusted: answer ?? false })
        const { validation, ledger, observer } = harness({ status: UNTRUSTED, delegate })

        const promise = validate(validation, { onUntrustedCertificate: action })
        if (accepted) {
          expect(await promise).toBeNull()
        } else {
          await expect(promise).rejects.toBeInstanceOf(SignerNotTrustedError)
        }

        expect(ledger.calls).toHaveLength(1)
        expect(ledger.calls[0]?.signingEntity).toBeNull()
        expect(observer.messages('warning')).toHaveLength(warnings)
        expect(delegate.calls).toHaveLength(action === 'prompt' ? 1 : 0)
      })
    }

    it('with error should fail with signer not trusted and still reconcile with no identity', async () => {
      const { validation, ledger, observer } = harness({ status: UNTRUSTED })

      await expect(validate(validation, { onUntrustedCertificate: 'error' })).rejects.toThrow(
        'acme.widgets 1.2.0 from https://packages.example.com signer not trusted: Test Signer, Acme Test Org',
      )

      expect(ledger.calls).toEqual([
        {
          registry: TEST_REGISTRY,
          package: TEST_PACKAGE,
          version: TEST_VERSION,
          signingEntity: null,
        },
      ])
      expect(observer.messages('info')).toEqual([
        "acme.widgets 1.2.0 from https://packages.example.com signing entity 'Test Signer, Acme Test Org' is untrusted",
      ])
    })

    it('should fail with MissingConfigurationError when onUntrustedCertificate is absent', async () => {
      const { validation, ledger } = harness({ status: UNTRUSTED })
      await expect(validate(validation, { onUnsigned: 'error' })).rejects.toThrow(
        'missing configuration: security.signing.onUntrustedCertificate',
      )
      expect(ledger.calls).toHaveLength(0)
    })
  })

  describe('hard failures', () => {
    it('should fail with missing source archive and never reconcile', async () => {
      const { validation, ledger, verifier } = harness({ metadata: { withoutSourceArchive: true } })

      const promise = validate(validation, { onUnsigned: 'silentAllow' })
      await expect(promise).rejects.toBeInstanceOf(MissingSourceArchiveError)
      await expect(promise).rejects.toThrow('missing source archive')

      expect(ledger.calls).toHaveLength(0)
      expect(verifier.calls).toHaveLength(0)
    })

    it('should wrap metadata retrieval failures with release context', async () => {
      const { validation, metadataProvider, ledger } = harness()
      metadataProvider.fail(TEST_PACKAGE, TEST_VERSION, new Error('connection reset'))

      let caught: unknown
      try {
        await validate(validation, {})
      } catch (err) {
        caught = err
      }

      expect(caught).toBeInstanceOf(MetadataRetrievalError)
      if (caught instanceof MetadataRetrievalError) {
        expect(caught.registry).toEqual(TEST_REGISTRY)
        expect(caught.package).toEqual(TEST_PACKAGE)
        expect(caught.version).toBe(TEST_VERSION)
        expect(caught.cause).toBeInstanceOf(Error)
        expect(caught.message).toBe(
          'failed retrieving source archive signature for acme.widgets 1.2.0 from https://packages.example.com: connection reset',
        )
      }
      expect(ledger.calls).toHaveLength(0)
    })

    it('should fail on an unknown signature format before calling the verifier', async () => {
      const { validation, verifier, ledger } = harness({ metadata: { signatureFormat: 'xyz' } })
      await expect(validate(validation, {})).rejects.toBeInstanceOf(UnknownSignatureFormatError)
      expect(verifier.calls).toHaveLength(0)
      expect(ledger.calls).toHaveLength(0)
    })

    it('should fail on an unusable trust-root directory before calling the verifier', async () => {
      const { validation, verifier } = harness()
      await expect(
        validate(validation, { trustedRootCertificatesPath: '/nowhere' }),
      ).rejects.toThrow('bad configuration: /nowhere is not a directory')
      expect(verifier.calls).toHaveLength(0)
    })

    it('should map an invalid signature to InvalidSignatureError', async () => {
      const { validation, ledger } = harness({ status: { status: 'invalid', reason: 'digest mismatch' } })
      await expect(validate(validation, {})).rejects.toThrow(InvalidSignatureError)
      expect(ledger.calls).toHaveLength(0)
    })

    it('should map an invalid certificate to InvalidSigningCertificateError', async () => {
      const { validation } = harness({
        status: { status: 'certificateInvalid', reason: 'certificate expired' },
      })
      await expect(validate(validation, {})).rejects.toThrow(
        'invalid signing certificate for acme.widgets 1.2.0 from https://packages.example.com: certificate expired',
      )
    })

    it('should wrap verifier invocation failures', async () => {
      const { validation } = harness({ status: new Error('verifier crashed') })
      const promise = validate(validation, {})
      await expect(promise).rejects.toBeInstanceOf(SignatureVerificationFailedError)
      await expect(promise).rejects.toThrow('verifier crashed')
    })
  })

  describe('reconciliation', () => {
    it('should keep the decided result when the ledger fails', async () => {
      const { validation, ledger, observer } = harness()
      ledger.failWith(new Error('ledger unavailable'))

      expect(await validate(validation, {})).toEqual(TEST_SIGNER)
      expect(observer.messages('warning')).toEqual([
        'signing entity check for acme.widgets 1.2.0 from https://packages.example.com failed: ledger unavailable',
      ])
    })

    it('should wait for the ledger before settling', async () => {
      const { validation, ledger } = harness()
      const order: string[] = []
      vi.spyOn(ledger, 'reconcile').mockImplementation(async () => {
        await new Promise((resolve) => setTimeout(resolve, 5))
        order.push('reconciled')
        return 'firstUse'
      })

      await validate(validation, {})
      order.push('settled')

      expect(order).toEqual(['reconciled', 'settled'])
    })

    it('should run concurrent validations independently', async () => {
      const { validation, ledger } = harness()
      const results = await Promise.all([validate(validation, {}), validate(validation, {})])
      expect(results).toEqual([TEST_SIGNER, TEST_SIGNER])
      expect(ledger.calls).toHaveLength(2)
    })
  })
})

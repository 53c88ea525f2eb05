/**
 * sigwarden: signature and signer-trust validation for package releases.
 *
 * @packageDocumentation
 */

export {
  SigningError,
  ReleaseError,
  MetadataRetrievalError,
  MissingSourceArchiveError,
  SourceArchiveNotSignedError,
  MalformedSignatureError,
  MissingSignatureFormatError,
  UnknownSignatureFormatError,
  InvalidSignatureError,
  InvalidSigningCertificateError,
  SignatureVerificationFailedError,
  SignerNotTrustedError,
  DelegateDecisionError,
  MissingConfigurationError,
  BadConfigurationError,
} from './errors.js'

export type {
  Registry,
  PackageIdentity,
  ReleaseRef,
  SigningEntity,
  SignatureFormat,
  SignatureStatus,
  SigningAction,
  CertificateExpirationCheck,
  CertificateRevocationCheck,
  SigningConfiguration,
  ResourceSigning,
  ReleaseResource,
  ReleaseMetadata,
  CollaboratorOptions,
  ReleaseMetadataProvider,
  ObservationSeverity,
  ValidationEvent,
  ValidationObserver,
  ReconcileRequest,
  SigningEntityLedger,
  SignatureValidationDelegate,
} from './types.js'

export {
  formatPackage,
  formatRelease,
  parsePackageIdentity,
  describeSigningEntity,
  signingEntitiesEqual,
} from './release.js'

export {
  SIGNATURE_FORMATS,
  SOURCE_ARCHIVE_NAME,
  SOURCE_ARCHIVE_TYPE,
  parseSignatureFormat,
  findSourceArchive,
  decodeBase64Strict,
  decodeSignature,
} from './signing/index.js'
export type { DecodedSignature } from './signing/index.js'

export type {
  CertificateExpirationPolicy,
  CertificateRevocationPolicy,
  VerifierConfiguration,
  VerificationRequest,
  SignatureVerifier,
  TrustRootFileSystem,
} from './verifier/index.js'
export {
  nodeFileSystem,
  buildVerifierConfiguration,
  defaultVerifierConfiguration,
  loadTrustedRoots,
} from './verifier/index.js'

export { TrustPolicyEngine, decideTrustAction, actionConfigKey } from './policy/index.js'
export type { TrustFailure, TrustDecision, TrustPolicyEngineOptions } from './policy/index.js'

export {
  AutoAcceptDelegate,
  AutoRejectDelegate,
  InteractivePromptDelegate,
} from './delegate/index.js'
export type { InteractivePromptOptions } from './delegate/index.js'

export { SignatureValidation } from './validation/index.js'
export type { SignatureValidationOptions, ValidateRequest } from './validation/index.js'

export {
  loadRegistriesConfig,
  validateRegistriesConfig,
  validateSigningConfiguration,
  defaultRegistriesConfig,
  defaultSigningConfiguration,
  mergeSigningConfiguration,
  resolveSigningConfiguration,
} from './config.js'
export type { RegistriesConfig, SecurityConfig, SecurityEntry } from './config.js'

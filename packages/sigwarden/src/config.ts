/**
 * Registry security configuration loading, validation, and per-package
 * resolution.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises'
import { BadConfigurationError } from './errors.js'
import { formatPackage } from './release.js'
import type {
  CertificateExpirationCheck,
  CertificateRevocationCheck,
  PackageIdentity,
  Registry,
  SigningAction,
  SigningConfiguration,
} from './types.js'

/** A security block that may carry signing settings. */
export interface SecurityEntry {
  signing?: SigningConfiguration | undefined
}

/** Security settings with their override layers. */
export interface SecurityConfig {
  /** Applies to every registry and package. */
  default: SecurityEntry
  /** Keyed by registry host (e.g. `packages.example.com`). */
  registryOverrides: Record<string, SecurityEntry>
  /** Keyed by package scope. */
  scopeOverrides: Record<string, SecurityEntry>
  /** Keyed by `scope.name`. */
  packageOverrides: Record<string, SecurityEntry>
}

/** Registries configuration file structure. */
export interface RegistriesConfig {
  /** Config schema version. Currently must be `1`. */
  version: number
  security: SecurityConfig
}

const SIGNING_ACTIONS: readonly SigningAction[] = ['prompt', 'error', 'warn', 'silentAllow']
const EXPIRATION_CHECKS: readonly CertificateExpirationCheck[] = ['enabled', 'disabled']
const REVOCATION_CHECKS: readonly CertificateRevocationCheck[] = [
  'strict',
  'allowSoftFail',
  'disabled',
]

/** Signing settings used when a configuration has no `security` block. */
export function defaultSigningConfiguration(): SigningConfiguration {
  return {
    onUnsigned: 'prompt',
    onUntrustedCertificate: 'prompt',
    includeDefaultTrustedRootCertificates: true,
    validationChecks: {
      certificateExpiration: 'disabled',
      certificateRevocation: 'allowSoftFail',
    },
  }
}

/** Default configuration when no config file exists. */
export function defaultRegistriesConfig(): RegistriesConfig {
  return {
    version: 1,
    security: {
      default: { signing: defaultSigningConfiguration() },
      registryOverrides: {},
      scopeOverrides: {},
      packageOverrides: {},
    },
  }
}

/**
 * Type guard for plain objects.
 */
function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function oneOf<T extends string>(
  value: unknown,
  allowed: readonly T[],
  where: string,
): T | undefined {
  if (value === undefined) {
    return undefined
  }
  const match = allowed.find((candidate) => candidate === value)
  if (match === undefined) {
    throw new BadConfigurationError(`${where} must be one of: ${allowed.join(', ')}`)
  }
  return match
}

/**
 * Validate a `signing` block. Absent keys stay absent.
 */
export function validateSigningConfiguration(value: unknown, where: string): SigningConfiguration {
  if (!isObject(value)) {
    throw new BadConfigurationError(`${where} must be an object`)
  }

  const result: SigningConfiguration = {}

  const onUnsigned = oneOf(value.onUnsigned, SIGNING_ACTIONS, `${where}.onUnsigned`)
  if (onUnsigned !== undefined) {
    result.onUnsigned = onUnsigned
  }

  const onUntrusted = oneOf(
    value.onUntrustedCertificate,
    SIGNING_ACTIONS,
    `${where}.onUntrustedCertificate`,
  )
  if (onUntrusted !== undefined) {
    result.onUntrustedCertificate = onUntrusted
  }

  if (value.trustedRootCertificatesPath !== undefined) {
    if (
      typeof value.trustedRootCertificatesPath !== 'string' ||
      value.trustedRootCertificatesPath.trim() === ''
    ) {
      throw new BadConfigurationError(`${where}.trustedRootCertificatesPath must be a non-empty string`)
    }
    result.trustedRootCertificatesPath = value.trustedRootCertificatesPath
  }

  if (value.includeDefaultTrustedRootCertificates !== undefined) {
    if (typeof value.includeDefaultTrustedRootCertificates !== 'boolean') {
      throw new BadConfigurationError(`${where}.includeDefaultTrustedRootCertificates must be a boolean`)
    }
    result.includeDefaultTrustedRootCertificates = value.includeDefaultTrustedRootCertificates
  }

  if (value.validationChecks !== undefined) {
    const checks = value.validationChecks
    if (!isObject(checks)) {
      throw new BadConfigurationError(`${where}.validationChecks must be an object`)
    }
    const expiration = oneOf(
      checks.certificateExpiration,
      EXPIRATION_CHECKS,
      `${where}.validationChecks.certificateExpiration`,
    )
    const revocation = oneOf(
      checks.certificateRevocation,
      REVOCATION_CHECKS,
      `${where}.validationChecks.certificateRevocation`,
    )
    const validationChecks: NonNullable<SigningConfiguration['validationChecks']> = {}
    if (expiration !== undefined) {
      validationChecks.certificateExpiration = expiration
    }
    if (revocation !== undefined) {
      validationChecks.certificateRevocation = revocation
    }
    result.validationChecks = validationChecks
  }

  return result
}

function validateSecurityEntry(value: unknown, where: string): SecurityEntry {
  if (!isObject(value)) {
    throw new BadConfigurationError(`${where} must be an object`)
  }
  if (value.signing === undefined) {
    return {}
  }
  return { signing: validateSigningConfiguration(value.signing, `${where}.signing`) }
}

function validateOverrides(value: unknown, where: string): Record<string, SecurityEntry> {
  if (value === undefined) {
    return {}
  }
  if (!isObject(value)) {
    throw new BadConfigurationError(`${where} must be an object`)
  }
  const result: Record<string, SecurityEntry> = {}
  for (const [key, entry] of Object.entries(value)) {
    result[key] = validateSecurityEntry(entry, `${where}.${key}`)
  }
  return result
}

/**
 * Validate an unknown value as a RegistriesConfig.
 *
 * A config without a `security` block gets the default signing settings. A
 * config that has one is taken as written: keys it leaves out stay unset.
 *
 * @throws {@link BadConfigurationError} naming the first offending key.
 */
export function validateRegistriesConfig(config: unknown): RegistriesConfig {
  if (!isObject(config)) {
    throw new BadConfigurationError('Config must be an object')
  }

  if (typeof config.version !== 'number' || config.version !== 1) {
    throw new BadConfigurationError('Config version must be 1')
  }

  if (config.security === undefined) {
    return defaultRegistriesConfig()
  }

  const security = config.security
  if (!isObject(security)) {
    throw new BadConfigurationError('Config security must be an object')
  }

  return {
    version: 1,
    security: {
      default:
        security.default === undefined
          ? {}
          : validateSecurityEntry(security.default, 'security.default'),
      registryOverrides: validateOverrides(security.registryOverrides, 'security.registryOverrides'),
      scopeOverrides: validateOverrides(security.scopeOverrides, 'security.scopeOverrides'),
      packageOverrides: validateOverrides(security.packageOverrides, 'security.packageOverrides'),
    },
  }
}

/**
 * Load the registries config from disk, falling back to defaults if the file
 * does not exist.
 *
 * @param configPath - Path to the JSON configuration file.
 */
export async function loadRegistriesConfig(configPath: string): Promise<RegistriesConfig> {
  let raw: string
  try {
    raw = await fs.readFile(configPath, 'utf-8')
  } catch {
    return defaultRegistriesConfig()
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    throw new BadConfigurationError(`Failed to parse config file at ${configPath}`)
  }

  return validateRegistriesConfig(parsed)
}

/**
 * Overlay `override` onto `base`. Keys set in `override` win; validation
 * checks are overlaid key by key.
 */
export function mergeSigningConfiguration(
  base: SigningConfiguration,
  override: SigningConfiguration | undefined,
): SigningConfiguration {
  if (override === undefined) {
    return base
  }

  const merged: SigningConfiguration = { ...base }
  if (override.onUnsigned !== undefined) {
    merged.onUnsigned = override.onUnsigned
  }
  if (override.onUntrustedCertificate !== undefined) {
    merged.onUntrustedCertificate = override.onUntrustedCertificate
  }
  if (override.trustedRootCertificatesPath !== undefined) {
    merged.trustedRootCertificatesPath = override.trustedRootCertificatesPath
  }
  if (override.includeDefaultTrustedRootCertificates !== undefined) {
    merged.includeDefaultTrustedRootCertificates = override.includeDefaultTrustedRootCertificates
  }
  if (override.validationChecks !== undefined) {
    const checks = { ...base.validationChecks }
    if (override.validationChecks.certificateExpiration !== undefined) {
      checks.certificateExpiration = override.validationChecks.certificateExpiration
    }
    if (override.validationChecks.certificateRevocation !== undefined) {
      checks.certificateRevocation = override.validationChecks.certificateRevocation
    }
    merged.validationChecks = checks
  }
  return merged
}

/**
 * Resolve the effective signing configuration for `pkg` on `registry`:
 * default, then registry override, then scope override, then package override.
 *
 * @throws {@link BadConfigurationError} if the registry URL cannot be parsed.
 */
export function resolveSigningConfiguration(
  config: RegistriesConfig,
  registry: Registry,
  pkg: PackageIdentity,
): SigningConfiguration {
  let host: string
  try {
    host = new URL(registry.url).host
  } catch (err) {
    throw new BadConfigurationError(`registry URL '${registry.url}' is invalid`, undefined, {
      cause: err,
    })
  }

  const { security } = config
  let signing = mergeSigningConfiguration({}, security.default.signing)
  signing = mergeSigningConfiguration(signing, security.registryOverrides[host]?.signing)
  signing = mergeSigningConfiguration(signing, security.scopeOverrides[pkg.scope]?.signing)
  signing = mergeSigningConfiguration(
    signing,
    security.packageOverrides[formatPackage(pkg)]?.signing,
  )
  return signing
}

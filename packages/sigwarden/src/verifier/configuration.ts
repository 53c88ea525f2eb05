/**
 * Translation of a registry's declarative signing configuration into the
 * concrete configuration the signature verifier consumes.
 *
 * Trust roots are re-read on every call; nothing is cached.
 */

import * as path from 'node:path'
import { BadConfigurationError } from '../errors.js'
import type { SigningConfiguration } from '../types.js'
import type { TrustRootFileSystem, VerifierConfiguration } from './types.js'
import { nodeFileSystem } from './filesystem.js'

/**
 * The verifier's own defaults, used for every setting the registry leaves
 * unset.
 */
export function defaultVerifierConfiguration(): VerifierConfiguration {
  return {
    trustedRoots: [],
    includeDefaultTrustStore: true,
    certificateExpiration: { mode: 'enabled' },
    certificateRevocation: 'strict',
  }
}

/**
 * Load every file in `directory` as a trust anchor, in listing order.
 *
 * @throws {@link BadConfigurationError} if the path is not absolute, is not a
 * directory, or any entry cannot be read. No partial list is ever returned.
 */
export async function loadTrustedRoots(
  directory: string,
  fileSystem: TrustRootFileSystem,
): Promise<Uint8Array[]> {
  if (!path.isAbsolute(directory)) {
    throw new BadConfigurationError(
      `${directory} is invalid: trusted root certificates path must be absolute`,
      directory,
    )
  }
  let isDirectory: boolean
  try {
    isDirectory = await fileSystem.isDirectory(directory)
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err)
    throw new BadConfigurationError(`${directory} is invalid: ${detail}`, directory, {
      cause: err,
    })
  }
  if (!isDirectory) {
    throw new BadConfigurationError(`${directory} is not a directory`, directory)
  }

  try {
    const entries = await fileSystem.readDirectory(directory)
    const roots: Uint8Array[] = []
    for (const entry of entries) {
      roots.push(await fileSystem.readFile(path.join(directory, entry)))
    }
    return roots
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err)
    throw new BadConfigurationError(`failed to load trust roots: ${detail}`, directory, {
      cause: err,
    })
  }
}

/**
 * Build the verifier configuration for one validation call.
 *
 * @param signing - The registry's signing configuration.
 * @param fileSystem - Filesystem used to read trusted roots. Defaults to the local disk.
 */
export async function buildVerifierConfiguration(
  signing: SigningConfiguration,
  fileSystem: TrustRootFileSystem = nodeFileSystem,
): Promise<VerifierConfiguration> {
  const configuration = defaultVerifierConfiguration()

  if (signing.trustedRootCertificatesPath !== undefined) {
    configuration.trustedRoots = await loadTrustedRoots(
      signing.trustedRootCertificatesPath,
      fileSystem,
    )
  }

  if (signing.includeDefaultTrustedRootCertificates !== undefined) {
    configuration.includeDefaultTrustStore = signing.includeDefaultTrustedRootCertificates
  }

  const checks = signing.validationChecks
  if (checks?.certificateExpiration !== undefined) {
    configuration.certificateExpiration =
      checks.certificateExpiration === 'enabled' ? { mode: 'enabled' } : { mode: 'disabled' }
  }
  if (checks?.certificateRevocation !== undefined) {
    configuration.certificateRevocation = checks.certificateRevocation
  }

  return configuration
}

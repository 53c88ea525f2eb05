import { parseArgs } from 'node:util'
import {
  buildVerifierConfiguration,
  formatPackage,
  loadRegistriesConfig,
  parsePackageIdentity,
  resolveSigningConfiguration,
} from 'sigwarden'
import type { SigningConfiguration, VerifierConfiguration } from 'sigwarden'
import { bold, formatError, formatRows } from '../output.js'

const USAGE =
  'Usage: sigwarden check-config --config <file> --registry <url> --package <scope.name>\n'

function describeRoots(signing: SigningConfiguration, verifier: VerifierConfiguration): string {
  const count = String(verifier.trustedRoots.length)
  return signing.trustedRootCertificatesPath === undefined
    ? count
    : `${count} (from ${signing.trustedRootCertificatesPath})`
}

/**
 * Print the effective signing policy for a package on a registry and load the
 * configured trust roots the same way a validation would.
 */
export async function checkConfigCommand(args: string[]): Promise<number> {
  let values: { config?: string | undefined; registry?: string | undefined; package?: string | undefined }
  try {
    values = parseArgs({
      args,
      options: {
        config: { type: 'string' },
        registry: { type: 'string' },
        package: { type: 'string' },
      },
      strict: true,
    }).values
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    process.stderr.write(USAGE)
    return 1
  }

  if (values.config === undefined || values.registry === undefined || values.package === undefined) {
    process.stderr.write('Error: --config, --registry and --package are required\n')
    process.stderr.write(USAGE)
    return 1
  }

  const pkg = parsePackageIdentity(values.package)
  if (pkg === undefined) {
    process.stderr.write(`Error: package must be in the form scope.name, got '${values.package}'\n`)
    return 1
  }

  try {
    const registry = { url: values.registry }
    const config = await loadRegistriesConfig(values.config)
    const signing = resolveSigningConfiguration(config, registry, pkg)
    const verifier = await buildVerifierConfiguration(signing)

    process.stdout.write(`${bold(`${formatPackage(pkg)} on ${registry.url}`)}\n`)
    process.stdout.write(
      formatRows([
        ['On unsigned', signing.onUnsigned ?? 'not set'],
        ['On untrusted certificate', signing.onUntrustedCertificate ?? 'not set'],
        ['Trusted roots', describeRoots(signing, verifier)],
        ['Default trust store', verifier.includeDefaultTrustStore ? 'included' : 'excluded'],
        ['Certificate expiration', verifier.certificateExpiration.mode],
        ['Certificate revocation', verifier.certificateRevocation],
      ]),
    )

    if (signing.onUnsigned === undefined || signing.onUntrustedCertificate === undefined) {
      process.stderr.write(
        'Warning: validations needing an unset action will fail with a missing configuration error\n',
      )
    }
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}

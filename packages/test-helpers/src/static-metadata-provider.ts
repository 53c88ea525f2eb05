/**
 * Release metadata provider serving canned metadata.
 */

import { formatPackage } from 'sigwarden'
import type {
  CollaboratorOptions,
  PackageIdentity,
  ReleaseMetadata,
  ReleaseMetadataProvider,
} from 'sigwarden'

/** A recorded `getMetadata` call. */
export interface MetadataRequest {
  package: PackageIdentity
  version: string
  options: CollaboratorOptions | undefined
}

/**
 * Serves metadata registered with {@link StaticMetadataProvider.add}. Unknown
 * releases reject the way a registry answering 404 would.
 *
 * @public
 */
export class StaticMetadataProvider implements ReleaseMetadataProvider {
  readonly #releases = new Map<string, ReleaseMetadata | Error>()
  readonly #requests: MetadataRequest[] = []

  /** Serve `metadata` for `pkg` at `version`. */
  add(pkg: PackageIdentity, version: string, metadata: ReleaseMetadata): this {
    this.#releases.set(`${formatPackage(pkg)}@${version}`, metadata)
    return this
  }

  /** Reject requests for `pkg` at `version` with `error`. */
  fail(pkg: PackageIdentity, version: string, error: Error): this {
    this.#releases.set(`${formatPackage(pkg)}@${version}`, error)
    return this
  }

  getMetadata(
    pkg: PackageIdentity,
    version: string,
    options?: CollaboratorOptions,
  ): Promise<ReleaseMetadata> {
    this.#requests.push({ package: pkg, version, options })
    const entry = this.#releases.get(`${formatPackage(pkg)}@${version}`)
    if (entry === undefined) {
      return Promise.reject(new Error(`release ${formatPackage(pkg)} ${version} not found`))
    }
    if (entry instanceof Error) {
      return Promise.reject(entry)
    }
    return Promise.resolve(entry)
  }

  /** Every request received, in call order. */
  get requests(): readonly MetadataRequest[] {
    return this.#requests
  }
}

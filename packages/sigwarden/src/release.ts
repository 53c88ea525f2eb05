/**
 * Rendering helpers for packages, releases and signing entities.
 */

import type { PackageIdentity, ReleaseRef, SigningEntity } from './types.js'

/** Render a package identity as `scope.name`. */
export function formatPackage(pkg: PackageIdentity): string {
  return `${pkg.scope}.${pkg.name}`
}

/** Render a release as `scope.name version from registry`. */
export function formatRelease(release: ReleaseRef): string {
  return `${formatPackage(release.package)} ${release.version} from ${release.registry.url}`
}

/**
 * Parse `scope.name` into a package identity.
 *
 * @returns `undefined` when either part is empty or the separator is missing.
 */
export function parsePackageIdentity(text: string): PackageIdentity | undefined {
  const dot = text.indexOf('.')
  if (dot <= 0 || dot === text.length - 1) {
    return undefined
  }
  return { scope: text.slice(0, dot), name: text.slice(dot + 1) }
}

/** Human-readable description of a signing entity. */
export function describeSigningEntity(entity: SigningEntity): string {
  if (entity.kind === 'recognized') {
    return `${entity.name} (${entity.organization}, ${entity.organizationalUnit}) [${entity.type}]`
  }
  const parts = [entity.name, entity.organization, entity.organizationalUnit].filter(
    (part): part is string => part !== undefined && part !== '',
  )
  return parts.length > 0 ? parts.join(', ') : 'unknown signer'
}

/** Structural equality for signing entities, used for TOFU comparisons. */
export function signingEntitiesEqual(a: SigningEntity, b: SigningEntity): boolean {
  if (a.kind === 'recognized' && b.kind === 'recognized') {
    return (
      a.type === b.type &&
      a.name === b.name &&
      a.organizationalUnit === b.organizationalUnit &&
      a.organization === b.organization
    )
  }
  if (a.kind === 'unrecognized' && b.kind === 'unrecognized') {
    return (
      a.name === b.name &&
      a.organizationalUnit === b.organizationalUnit &&
      a.organization === b.organization
    )
  }
  return false
}

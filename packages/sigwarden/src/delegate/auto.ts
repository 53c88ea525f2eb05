import type { PackageIdentity, Registry, SignatureValidationDelegate } from '../types.js'

/** Continues past every unsigned or untrusted release. */
export class AutoAcceptDelegate implements SignatureValidationDelegate {
  decideUnsigned(_registry: Registry, _pkg: PackageIdentity, _version: string): Promise<boolean> {
    return Promise.resolve(true)
  }

  decideUntrusted(_registry: Registry, _pkg: PackageIdentity, _version: string): Promise<boolean> {
    return Promise.resolve(true)
  }
}

/** Rejects every unsigned or untrusted release. Suited to batch and CI runs. */
export class AutoRejectDelegate implements SignatureValidationDelegate {
  decideUnsigned(_registry: Registry, _pkg: PackageIdentity, _version: string): Promise<boolean> {
    return Promise.resolve(false)
  }

  decideUntrusted(_registry: Registry, _pkg: PackageIdentity, _version: string): Promise<boolean> {
    return Promise.resolve(false)
  }
}

import type { PackageIdentity, Registry, SignatureValidationDelegate } from 'sigwarden'

/** Which question a delegate was asked. */
export type DelegateQuestion = 'unsigned' | 'untrusted'

/** A recorded delegate call. */
export interface DelegateCall {
  question: DelegateQuestion
  registry: Registry
  package: PackageIdentity
  version: string
}

/**
 * Delegate answering with fixed replies and recording every question.
 * @public
 */
export class ScriptedDelegate implements SignatureValidationDelegate {
  readonly calls: DelegateCall[] = []
  readonly #answers: Record<DelegateQuestion, boolean>

  constructor(answers: Partial<Record<DelegateQuestion, boolean>> = {}) {
    this.#answers = {
      unsigned: answers.unsigned ?? false,
      untrusted: answers.untrusted ?? false,
    }
  }

  decideUnsigned(registry: Registry, pkg: PackageIdentity, version: string): Promise<boolean> {
    this.calls.push({ question: 'unsigned', registry, package: pkg, version })
    return Promise.resolve(this.#answers.unsigned)
  }

  decideUntrusted(registry: Registry, pkg: PackageIdentity, version: string): Promise<boolean> {
    this.calls.push({ question: 'untrusted', registry, package: pkg, version })
    return Promise.resolve(this.#answers.untrusted)
  }
}

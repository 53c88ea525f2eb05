import * as readline from 'node:readline'
import { formatPackage } from '../release.js'
import type { PackageIdentity, Registry, SignatureValidationDelegate } from '../types.js'

/** Streams an {@link InteractivePromptDelegate} talks to. */
export interface InteractivePromptOptions {
  /** Where answers are read from. Defaults to `process.stdin`. */
  input?: NodeJS.ReadableStream & { isTTY?: boolean | undefined }
  /** Where questions are written. Defaults to `process.stderr`. */
  output?: NodeJS.WritableStream
  /**
   * Prompt even when `input` is not a TTY. Off by default so that piped or
   * unattended runs fail instead of blocking on a question nobody sees.
   */
  allowNonInteractive?: boolean
}

/**
 * Asks the person at the terminal whether to continue with an unsigned or
 * untrusted release. Only `y` or `yes` continues.
 *
 * Concurrent questions are asked one after another; each typed line answers
 * exactly one of them.
 */
export class InteractivePromptDelegate implements SignatureValidationDelegate {
  readonly #input: NodeJS.ReadableStream & { isTTY?: boolean | undefined }
  readonly #output: NodeJS.WritableStream
  readonly #allowNonInteractive: boolean
  /** Tail of the prompt queue; one question reads from `input` at a time. */
  #pending: Promise<unknown> = Promise.resolve()

  constructor(options: InteractivePromptOptions = {}) {
    this.#input = options.input ?? process.stdin
    this.#output = options.output ?? process.stderr
    this.#allowNonInteractive = options.allowNonInteractive ?? false
  }

  decideUnsigned(registry: Registry, pkg: PackageIdentity, version: string): Promise<boolean> {
    return this.#confirm(
      `${formatPackage(pkg)} ${version} from ${registry.url} is not signed. Continue? [y/N] `,
    )
  }

  decideUntrusted(registry: Registry, pkg: PackageIdentity, version: string): Promise<boolean> {
    return this.#confirm(
      `${formatPackage(pkg)} ${version} from ${registry.url} is signed with an untrusted certificate. Continue? [y/N] `,
    )
  }

  async #confirm(question: string): Promise<boolean> {
    if (!this.#allowNonInteractive && this.#input.isTTY !== true) {
      throw new Error('Signature validation requires interactive approval. Run this command in a terminal.')
    }
    const answer = await this.#question(question)
    const normalized = answer.trim().toLowerCase()
    return normalized === 'y' || normalized === 'yes'
  }

  #question(question: string): Promise<string> {
    const answer = this.#pending.then(() => this.#readAnswer(question))
    this.#pending = answer
    return answer
  }

  #readAnswer(question: string): Promise<string> {
    return new Promise((resolve) => {
      const rl = readline.createInterface({ input: this.#input, output: this.#output })
      let answered = false
      rl.question(question, (answer) => {
        answered = true
        rl.close()
        resolve(answer)
      })
      // Input ending before an answer counts as "no".
      rl.once('close', () => {
        if (!answered) {
          resolve('')
        }
      })
    })
  }
}

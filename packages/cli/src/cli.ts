/**
 * Command dispatch for the `sigwarden` CLI.
 *
 * Each subcommand is lazy-loaded via dynamic import() so only the requested
 * command's module (and its dependencies) is loaded.
 *
 * @internal
 */

function printHelp(): void {
  process.stdout.write(
    'Usage: sigwarden <command> [options]\n\n' +
      'Commands:\n' +
      '  check-config   Show the effective signing policy for a package and load its trust roots\n',
  )
}

/**
 * Run the CLI.
 *
 * @param argv - Arguments after the executable, subcommand first.
 * @returns The process exit code.
 */
export async function main(argv: string[]): Promise<number> {
  const subcommand = argv[0]
  const commandArgs = argv.slice(1)

  if (subcommand === undefined || subcommand === '--help' || subcommand === '-h') {
    printHelp()
    return 0
  }

  switch (subcommand) {
    case 'check-config': {
      const { checkConfigCommand } = await import('./commands/check-config.js')
      return checkConfigCommand(commandArgs)
    }
    default:
      process.stderr.write(`Unknown command: ${subcommand}\n`)
      printHelp()
      return 1
  }
}

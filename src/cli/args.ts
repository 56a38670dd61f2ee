/**
 * CLI Argument Parsing
 *
 * Uses commander for subcommand-based CLI with per-command options.
 */

import { Command } from 'commander'
import { VERSION } from '../index'
import { getConfigDescription, getValidConfigKeys } from './config'

export type ConfigAction = 'list' | 'set' | 'unset'

export interface CLIArgs {
  command: string
  /** Cache namespace (`<module>` or `<module>/<function>`) for keys and clear */
  namespace: string | undefined
  quiet: boolean
  verbose: boolean
  cacheDir: string | undefined
  configFile: string | undefined
  /** For config command: action (list, set, unset) */
  configAction: ConfigAction
  /** For config command: key name */
  configKey: string | undefined
  /** For config command: value to set */
  configValue: string | undefined
}

const DESCRIPTION = `Inspect and clean the on-disk cache of memoized function calls.

Entries live in <cache-dir>/<module>/<function>/<hash>.<ext>.

Examples:
  $ diskmemo list
  $ diskmemo keys main/fetchPrices
  $ diskmemo clear main/fetchPrices
  $ diskmemo clear --cache-dir ./.cache`

function createProgram(): Command {
  const program = new Command()
    .name('diskmemo')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    // Global options inherited by all subcommands
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output')
    .option('--cache-dir <dir>', 'Cache directory (or set DISKMEMO_CACHE_DIR)')
    .option('--config-file <path>', 'Config file path (or set DISKMEMO_CONFIG)')

  // ============ LIST ============
  program.command('list').description('Show cached functions with entry counts and sizes')

  // ============ KEYS ============
  program
    .command('keys')
    .description('List the entries of one cached function')
    .argument('<namespace>', 'Cached function as <module>/<function>')

  // ============ CLEAR ============
  program
    .command('clear')
    .description('Delete cached entries (everything when no namespace is given)')
    .argument('[namespace]', 'Module or <module>/<function> to clear')

  // ============ CONFIG ============
  const configKeys = getValidConfigKeys()
  const maxLen = Math.max(...configKeys.map((k) => k.length))
  const settingsHelp = configKeys
    .map((key) => `  ${key.padEnd(maxLen)}  ${getConfigDescription(key)}`)
    .join('\n')
  program
    .command('config')
    .description('Manage persistent settings')
    .argument('[action]', 'Action: list (default), set, unset')
    .argument('[key]', 'Config key to set/unset')
    .argument('[value]', 'Value to set')
    .addHelpText(
      'after',
      `
Available settings:
${settingsHelp}

Examples:
  diskmemo config                          List current settings
  diskmemo config set cacheDir ~/.memo     Use another cache root
  diskmemo config set codec json           Store entries as JSON
  diskmemo config unset cacheDir           Remove custom cache dir`
    )

  return program
}

function buildCLIArgs(
  commandName: string,
  namespace: string | undefined,
  opts: Record<string, unknown>
): CLIArgs {
  return {
    command: commandName,
    namespace,
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
    cacheDir: typeof opts.cacheDir === 'string' ? opts.cacheDir : undefined,
    configFile: typeof opts.configFile === 'string' ? opts.configFile : undefined,
    configAction: 'list',
    configKey: undefined,
    configValue: undefined
  }
}

function parseConfigAction(action: string | undefined): ConfigAction {
  if (action === 'set' || action === 'unset') {
    return action
  }
  return 'list'
}

/**
 * Attach action handlers that report the parsed args.
 * Uses optsWithGlobals() to include global options from the parent program.
 */
function captureArgs(program: Command, onParsed: (args: CLIArgs) => void): void {
  for (const cmd of program.commands) {
    cmd.action((namespace?: string) => {
      onParsed(buildCLIArgs(cmd.name(), namespace, cmd.optsWithGlobals()))
    })
  }

  // Handle no-argument list command
  const listCmd = program.commands.find((c) => c.name() === 'list')
  if (listCmd) {
    listCmd.action(() => {
      onParsed(buildCLIArgs('list', undefined, listCmd.optsWithGlobals()))
    })
  }

  // Handle config command with action, key, value arguments
  const configCmd = program.commands.find((c) => c.name() === 'config')
  if (configCmd) {
    configCmd.action((action?: string, key?: string, value?: string) => {
      onParsed({
        ...buildCLIArgs('config', undefined, configCmd.optsWithGlobals()),
        configAction: parseConfigAction(action),
        configKey: key,
        configValue: value
      })
    })
  }
}

/**
 * Parse CLI arguments and return structured args.
 * Exits on --help or --version.
 */
export function parseCliArgs(): CLIArgs {
  const program: Command = createProgram()

  let result: CLIArgs | null = null
  captureArgs(program, (args) => {
    result = args
  })

  program.parse()

  if (!result) {
    program.help()
  }

  return result
}

/**
 * Parse CLI arguments from an argv array (for testing).
 */
export function parseArgs(argv: string[], exitOnHelp = true): CLIArgs {
  const program = createProgram()

  if (!exitOnHelp) {
    program.exitOverride()
  }

  let result: CLIArgs | null = null
  captureArgs(program, (args) => {
    result = args
  })

  try {
    program.parse(argv, { from: 'user' })
  } catch (error) {
    // exitOverride throws on help/version
    if (!result) {
      return buildCLIArgs('help', undefined, {})
    }
    throw error
  }

  return result ?? buildCLIArgs('help', undefined, {})
}

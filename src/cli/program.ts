import { Command, CommanderError, Option } from 'commander'
import { RuckusOneClient } from '../client/ruckus-one.ts'
import { isRuckusOneError } from '../core/errors.ts'
import { setLogLevel } from '../core/logger.ts'
import { SDK_VERSION } from '../core/sdk-info.ts'
import type { TCredentials } from '../core/types.ts'
import { RUCKUS_REGIONS } from '../providers/endpoint/region-endpoint.ts'
import { registerApCommands } from './commands/ap.ts'
import { registerDpskCommands } from './commands/dpsk.ts'
import { registerRawCommand } from './commands/raw.ts'
import { registerVenueCommands } from './commands/venue.ts'
import { registerWlanCommands } from './commands/wlan.ts'
import { resolveCredentials } from './config.ts'
import type { TCliContext, TGlobalOptions } from './context.ts'
import { formatOutput, pickFields } from './output.ts'

export type TProgramOptions = {
  /** Builds the API client once credentials are resolved */
  createClient?: (credentials: TCredentials) => RuckusOneClient
  /** Environment used for credential resolution @default process.env */
  env?: Record<string, string | undefined>
  writeOut?: (text: string) => void
  writeErr?: (text: string) => void
}

/** Shape printed to stderr for every failed command. */
export type TCliErrorReport = {
  error: string
  kind: string
  statusCode?: number
  detail?: unknown
}

export function toErrorReport(error: unknown): TCliErrorReport {
  if (isRuckusOneError(error)) {
    return {
      error: error.message,
      kind: error.kind,
      statusCode: error.statusCode,
      detail: error.detail,
    }
  }
  return { error: error instanceof Error ? error.message : String(error), kind: 'generic' }
}

export function createProgram(options: TProgramOptions = {}): Command {
  const writeOut = options.writeOut ?? ((text: string) => process.stdout.write(`${text}\n`))
  const createClient =
    options.createClient ?? ((credentials: TCredentials) => new RuckusOneClient(credentials))

  const program = new Command()
  let client: RuckusOneClient | undefined

  const context: TCliContext = {
    getClient() {
      if (!client) {
        const globals = program.opts<TGlobalOptions>()
        client = createClient(resolveCredentials(globals, options.env))
      }
      return client
    },
    print(data) {
      const globals = program.opts<TGlobalOptions>()
      const fields = globals.fields
        ? globals.fields
            .split(',')
            .map((field) => field.trim())
            .filter(Boolean)
        : []
      const text = formatOutput(pickFields(data, fields), globals.output)
      if (text) writeOut(text)
    },
  }

  program
    .name('ruckus-one')
    .version(SDK_VERSION)
    .description(
      'Command line client for the RUCKUS One API\n\n' +
        'Credentials (in priority order):\n' +
        '  1. Flags:        --client-id, --client-secret, --tenant-id, --region\n' +
        '  2. Env vars:     RUCKUS_API_CLIENT_ID, RUCKUS_API_CLIENT_SECRET,\n' +
        '                   RUCKUS_API_TENANT_ID, RUCKUS_API_REGION (a .env file is loaded)\n' +
        '  3. Config file:  --config <path> or RUCKUS_CONFIG_FILE',
    )
    .option('--config <path>', 'JSON config file with a "credentials" section')
    .addOption(
      new Option('--region <region>', 'API region').choices(Object.keys(RUCKUS_REGIONS)),
    )
    .option('--client-id <id>', 'OAuth2 client ID')
    .option('--client-secret <secret>', 'OAuth2 client secret')
    .option('--tenant-id <id>', 'Tenant ID')
    .addOption(
      new Option('--output <format>', 'Output format').choices(['json', 'table']).default('json'),
    )
    .option('--fields <list>', 'Comma-separated list of fields to include in output')
    .option('--verbose', 'Log requests and token activity to stderr')
    .hook('preAction', () => {
      if (program.opts<TGlobalOptions>().verbose) setLogLevel('debug')
    })

  program.configureOutput({
    writeOut: (text) => writeOut(text.trimEnd()),
    writeErr: options.writeErr ?? ((text) => process.stderr.write(text)),
  })
  // Subcommands inherit this; parse failures surface as CommanderError instead of exiting
  program.exitOverride()

  registerVenueCommands(program, context)
  registerApCommands(program, context)
  registerWlanCommands(program, context)
  registerDpskCommands(program, context)
  registerRawCommand(program, context)

  return program
}

/** Parses argv and runs the selected command. Resolves to the process exit code. */
export async function run(argv: string[], options: TProgramOptions = {}): Promise<number> {
  const writeErr = options.writeErr ?? ((text: string) => process.stderr.write(text))
  const program = createProgram({ ...options, writeErr })

  try {
    await program.parseAsync(argv)
    return 0
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode
    writeErr(`${JSON.stringify(toErrorReport(error), null, 2)}\n`)
    return 1
  }
}

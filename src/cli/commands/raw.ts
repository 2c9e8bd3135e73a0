import { Argument, type Command } from 'commander'
import { ConfigurationError } from '../../core/errors.ts'
import type { THttpMethod } from '../../core/types.ts'
import { parseJsonOption, parseQueryList, type TCliContext } from '../context.ts'

const METHODS: THttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE']

function parseMethod(value: string): THttpMethod {
  const upper = value.toUpperCase()
  const method = METHODS.find((candidate) => candidate === upper)
  if (!method) throw new ConfigurationError(`Unsupported method "${value}"`)
  return method
}

export function registerRawCommand(program: Command, context: TCliContext): void {
  program
    .command('raw')
    .description('Send an arbitrary request to the API')
    .addArgument(
      new Argument('<method>', 'HTTP method').choices([
        ...METHODS,
        ...METHODS.map((method) => method.toLowerCase()),
      ]),
    )
    .argument('<path>', 'API path, e.g. /venues')
    .option('--data <json>', 'JSON request body')
    .option('--query <pairs>', 'Query parameters as k=v,k2=v2')
    .action(async (method: string, path: string, flags: { data?: string; query?: string }) => {
      const result = await context.getClient().request(parseMethod(method), path, {
        json: flags.data === undefined ? undefined : parseJsonOption(flags.data, '--data'),
        params: flags.query ? parseQueryList(flags.query) : undefined,
      })
      context.print(result)
    })
}

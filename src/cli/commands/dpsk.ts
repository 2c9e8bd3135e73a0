import type { Command } from 'commander'
import { ConfigurationError } from '../../core/errors.ts'
import type { TJsonObject } from '../../types/api.ts'
import {
  parseInteger,
  parseJsonObject,
  parseJsonOption,
  type TCliContext,
} from '../context.ts'

type TPageFlags = {
  pageSize?: number
  page?: number
  search?: string
}

function addPageOptions(command: Command): Command {
  return command
    .option('--page-size <n>', 'Results per page', parseInteger)
    .option('--page <n>', 'Zero-based page number', parseInteger)
    .option('--search <text>', 'Search string')
}

function queryFrom(flags: TPageFlags) {
  return { pageSize: flags.pageSize, page: flags.page, searchString: flags.search }
}

/** Accepts one passphrase object or an array of them. */
function parsePassphrases(value: string): TJsonObject[] {
  const parsed = parseJsonOption(value, '--data')
  const items = Array.isArray(parsed) ? parsed : [parsed]
  return items.map((item) => {
    if (typeof item !== 'object' || item === null || Array.isArray(item)) {
      throw new ConfigurationError('--data must be a JSON object or an array of objects')
    }
    return item
  })
}

export function registerDpskCommands(program: Command, context: TCliContext): void {
  const dpsk = program.command('dpsk').description('Manage DPSK services and passphrases')

  addPageOptions(dpsk.command('list').description('List DPSK services')).action(
    async (flags: TPageFlags) => {
      context.print(await context.getClient().dpsk.listServices(queryFrom(flags)))
    },
  )

  dpsk
    .command('get <serviceId>')
    .description('Show one DPSK service')
    .action(async (serviceId: string) => {
      context.print(await context.getClient().dpsk.getService(serviceId))
    })

  dpsk
    .command('create')
    .description('Create a DPSK service')
    .requiredOption('--name <name>', 'Service name')
    .option('--data <json>', 'Additional service fields as a JSON object')
    .action(async (flags: { name: string; data?: string }) => {
      const extra = flags.data ? parseJsonObject(flags.data, '--data') : {}
      context.print(await context.getClient().dpsk.createService({ ...extra, name: flags.name }))
    })

  dpsk
    .command('delete <serviceId>')
    .description('Delete a DPSK service')
    .action(async (serviceId: string) => {
      await context.getClient().dpsk.deleteService(serviceId)
      context.print({ deleted: serviceId })
    })

  addPageOptions(
    dpsk.command('passphrase-list <serviceId>').description('List passphrases of a service'),
  ).action(async (serviceId: string, flags: TPageFlags) => {
    context.print(await context.getClient().dpsk.listPassphrases(serviceId, queryFrom(flags)))
  })

  dpsk
    .command('passphrase-create <serviceId>')
    .description('Create passphrases in a service')
    .requiredOption('--data <json>', 'A passphrase object or an array of them')
    .action(async (serviceId: string, flags: { data: string }) => {
      context.print(
        await context
          .getClient()
          .dpsk.createPassphrases(serviceId, parsePassphrases(flags.data)),
      )
    })

  dpsk
    .command('export <serviceId>')
    .description('Export the passphrases of a service as CSV')
    .action(async (serviceId: string) => {
      context.print(await context.getClient().dpsk.exportPassphrasesCsv(serviceId))
    })
}

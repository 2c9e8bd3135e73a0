import { Option, type Command } from 'commander'
import type { TListOptions } from '../../core/query.ts'
import type { TAddress } from '../../types/api.ts'
import { parseInteger, parseJsonObject, type TCliContext } from '../context.ts'

export type TListFlags = {
  pageSize?: number
  page?: number
  search?: string
  sortField?: string
  sortOrder?: 'asc' | 'desc'
}

export function addListOptions(command: Command): Command {
  return command
    .option('--page-size <n>', 'Results per page', parseInteger)
    .option('--page <n>', 'Zero-based page number', parseInteger)
    .option('--search <text>', 'Search string')
    .option('--sort-field <field>', 'Field to sort by')
    .addOption(new Option('--sort-order <order>', 'Sort order').choices(['asc', 'desc']))
}

export function listOptionsFrom(flags: TListFlags): TListOptions {
  return {
    pageSize: flags.pageSize,
    page: flags.page,
    searchString: flags.search,
    sortField: flags.sortField,
    sortOrder: flags.sortOrder,
  }
}

function parseAddress(value: string): TAddress {
  const raw = parseJsonObject(value, '--address')
  const address: TAddress = {}
  for (const [field, fieldValue] of Object.entries(raw)) {
    if (typeof fieldValue === 'string') address[field] = fieldValue
  }
  return address
}

export function registerVenueCommands(program: Command, context: TCliContext): void {
  const venue = program.command('venue').description('Manage venues')

  addListOptions(venue.command('list').description('List venues')).action(
    async (flags: TListFlags) => {
      context.print(await context.getClient().venues.list(listOptionsFrom(flags)))
    },
  )

  venue
    .command('get <venueId>')
    .description('Show one venue')
    .action(async (venueId: string) => {
      context.print(await context.getClient().venues.get(venueId))
    })

  venue
    .command('create')
    .description('Create a venue')
    .requiredOption('--name <name>', 'Venue name')
    .requiredOption('--address <json>', 'Address as a JSON object')
    .option('--description <text>', 'Description')
    .option('--timezone <tz>', 'Timezone, e.g. America/New_York')
    .action(
      async (flags: { name: string; address: string; description?: string; timezone?: string }) => {
        const address = parseAddress(flags.address)
        context.print(
          await context.getClient().venues.create({
            name: flags.name,
            address,
            description: flags.description,
            timezone: flags.timezone,
          }),
        )
      },
    )

  venue
    .command('update <venueId>')
    .description('Update a venue')
    .requiredOption('--data <json>', 'Fields to update as a JSON object')
    .action(async (venueId: string, flags: { data: string }) => {
      context.print(
        await context.getClient().venues.update(venueId, parseJsonObject(flags.data, '--data')),
      )
    })

  venue
    .command('delete <venueId>')
    .description('Delete a venue')
    .action(async (venueId: string) => {
      await context.getClient().venues.delete(venueId)
      context.print({ deleted: venueId })
    })
}

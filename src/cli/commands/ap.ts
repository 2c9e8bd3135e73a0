import type { Command } from 'commander'
import { parseJsonObject, type TCliContext } from '../context.ts'
import { addListOptions, listOptionsFrom, type TListFlags } from './venue.ts'

export function registerApCommands(program: Command, context: TCliContext): void {
  const ap = program.command('ap').description('Manage access points')

  addListOptions(
    ap
      .command('list')
      .description('List access points')
      .option('--venue <venueId>', 'Only access points in this venue'),
  ).action(async (flags: TListFlags & { venue?: string }) => {
    const filters = flags.venue ? [{ type: 'VENUE', value: flags.venue }] : undefined
    context.print(
      await context.getClient().accessPoints.list({ ...listOptionsFrom(flags), filters }),
    )
  })

  ap
    .command('get <apId>')
    .description('Show one access point')
    .action(async (apId: string) => {
      context.print(await context.getClient().accessPoints.get(apId))
    })

  ap
    .command('update <venueId> <serialNumber>')
    .description('Update an access point')
    .requiredOption('--data <json>', 'Fields to update as a JSON object')
    .action(async (venueId: string, serialNumber: string, flags: { data: string }) => {
      context.print(
        await context
          .getClient()
          .accessPoints.update(venueId, serialNumber, parseJsonObject(flags.data, '--data')),
      )
    })

  ap
    .command('reboot <venueId> <serialNumber>')
    .description('Reboot an access point')
    .action(async (venueId: string, serialNumber: string) => {
      const result = await context.getClient().accessPoints.reboot(venueId, serialNumber)
      context.print(result ?? { rebooted: serialNumber })
    })
}

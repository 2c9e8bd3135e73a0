import type { Command } from 'commander'
import { parseInteger, parseJsonObject, type TCliContext } from '../context.ts'
import { addListOptions, listOptionsFrom, type TListFlags } from './venue.ts'

type TCreateFlags = {
  name: string
  ssid: string
  securityType: string
  vlanId?: number
  hidden?: boolean
  description?: string
}

export function registerWlanCommands(program: Command, context: TCliContext): void {
  const wlan = program.command('wlan').description('Manage wireless networks')

  addListOptions(wlan.command('list').description('List wireless networks')).action(
    async (flags: TListFlags) => {
      context.print(await context.getClient().wlans.list(listOptionsFrom(flags)))
    },
  )

  wlan
    .command('get <wlanId>')
    .description('Show one wireless network')
    .action(async (wlanId: string) => {
      context.print(await context.getClient().wlans.get(wlanId))
    })

  wlan
    .command('create')
    .description('Create a wireless network')
    .requiredOption('--name <name>', 'Network name')
    .requiredOption('--ssid <ssid>', 'Broadcast SSID')
    .requiredOption('--security-type <type>', 'Security type, e.g. WPA2')
    .option('--vlan-id <n>', 'VLAN ID', parseInteger)
    .option('--hidden', 'Hide the SSID')
    .option('--description <text>', 'Description')
    .action(async (flags: TCreateFlags) => {
      context.print(
        await context.getClient().wlans.create({
          name: flags.name,
          ssid: flags.ssid,
          securityType: flags.securityType,
          hidden: flags.hidden ?? false,
          vlanId: flags.vlanId,
          description: flags.description,
        }),
      )
    })

  wlan
    .command('update <wlanId>')
    .description('Update a wireless network')
    .requiredOption('--data <json>', 'Fields to update as a JSON object')
    .action(async (wlanId: string, flags: { data: string }) => {
      context.print(
        await context.getClient().wlans.update(wlanId, parseJsonObject(flags.data, '--data')),
      )
    })

  wlan
    .command('delete <wlanId>')
    .description('Delete a wireless network')
    .action(async (wlanId: string) => {
      await context.getClient().wlans.delete(wlanId)
      context.print({ deleted: wlanId })
    })

  wlan
    .command('deploy <wlanId> <venueId>')
    .description('Deploy a wireless network to a venue')
    .option('--ap-group <apGroupId>', 'Restrict the deployment to one AP group')
    .action(async (wlanId: string, venueId: string, flags: { apGroup?: string }) => {
      context.print(
        await context
          .getClient()
          .wlans.deployToVenue(wlanId, venueId, { apGroupId: flags.apGroup }),
      )
    })

  wlan
    .command('undeploy <wlanId> <venueId>')
    .description('Remove a wireless network deployment from a venue')
    .option('--ap-group <apGroupId>', 'Only remove the deployment for one AP group')
    .action(async (wlanId: string, venueId: string, flags: { apGroup?: string }) => {
      await context.getClient().wlans.undeployFromVenue(wlanId, venueId, flags.apGroup)
      context.print({ undeployed: wlanId, venueId })
    })
}

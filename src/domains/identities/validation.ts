import { ValidationError } from '../../core/errors.ts'

const MAC_PATTERN = /^([0-9A-F]{2}-){5}[0-9A-F]{2}$/

export function assertVlan(vlan: number): void {
  if (!Number.isInteger(vlan) || vlan < 1 || vlan > 4094) {
    throw new ValidationError({ detail: 'VLAN must be between 1 and 4094' })
  }
}

/** Upper-cases a MAC address and checks it is dash-separated (`AA-BB-CC-DD-EE-FF`). */
export function normalizeMac(macAddress: string): string {
  const normalized = macAddress.toUpperCase()
  if (!MAC_PATTERN.test(normalized)) {
    throw new ValidationError({ detail: 'MAC address must be in format XX-XX-XX-XX-XX-XX' })
  }
  return normalized
}

import { faker } from '@faker-js/faker'
import type {
  TAccessPoint,
  TDpskService,
  TIdentity,
  TPage,
  TVenue,
  TWlan,
} from '../../src/types/api.ts'

export function makeVenue(overrides?: Partial<TVenue>): TVenue {
  return {
    id: overrides?.id ?? faker.string.uuid(),
    name: overrides?.name ?? `${faker.location.city()} Office`,
    address: overrides?.address ?? {
      addressLine: faker.location.streetAddress(),
      city: faker.location.city(),
      country: faker.location.country(),
    },
  }
}

export function makeAccessPoint(overrides?: Partial<TAccessPoint>): TAccessPoint {
  return {
    serialNumber: overrides?.serialNumber ?? faker.string.numeric(12),
    name: overrides?.name ?? faker.word.noun(),
    model: overrides?.model ?? faker.helpers.arrayElement(['R550', 'R650', 'R750']),
    venueId: overrides?.venueId ?? faker.string.uuid(),
  }
}

export function makeWlan(overrides?: Partial<TWlan>): TWlan {
  const name = overrides?.name ?? faker.word.adjective()
  return {
    id: overrides?.id ?? faker.string.uuid(),
    name,
    ssid: overrides?.ssid ?? name,
    type: overrides?.type ?? 'psk',
  }
}

export function makeDpskService(overrides?: Partial<TDpskService>): TDpskService {
  return {
    id: overrides?.id ?? faker.string.uuid(),
    name: overrides?.name ?? faker.word.noun(),
    passphraseFormat: overrides?.passphraseFormat ?? 'MOST_SECURED',
    passphraseLength: overrides?.passphraseLength ?? 18,
  }
}

export function makeIdentity(overrides?: Partial<TIdentity>): TIdentity {
  return {
    id: overrides?.id ?? faker.string.uuid(),
    name: overrides?.name ?? faker.person.fullName(),
    groupId: overrides?.groupId ?? faker.string.uuid(),
    devices: overrides?.devices ?? [],
  }
}

export function makePage<T>(data: T[], overrides?: Partial<Omit<TPage<T>, 'data'>>): TPage<T> {
  return {
    data,
    totalCount: overrides?.totalCount ?? data.length,
    page: overrides?.page ?? 0,
  }
}

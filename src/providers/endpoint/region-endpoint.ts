import { logger } from '../../core/logger.ts'
import type { TEndpointProvider, TRegion } from '../../core/types.ts'

export const DEFAULT_REGION: TRegion = 'na'

export const RUCKUS_REGIONS: Readonly<Record<TRegion, string>> = Object.freeze({
  na: 'api.ruckus.cloud',
  eu: 'api.eu.ruckus.cloud',
  asia: 'api.asia.ruckus.cloud',
})

export function isRegion(value: string): value is TRegion {
  return Object.prototype.hasOwnProperty.call(RUCKUS_REGIONS, value)
}

/** Resolves a region code to its API host. Unknown codes resolve to the "na" host. */
export function resolveRegionHost(region: string = DEFAULT_REGION): string {
  if (isRegion(region)) return RUCKUS_REGIONS[region]
  logger.warn(
    `Unknown region "${region}", falling back to "${DEFAULT_REGION}". Valid regions: ${Object.keys(RUCKUS_REGIONS).join(', ')}`,
  )
  return RUCKUS_REGIONS[DEFAULT_REGION]
}

type TRegionEndpointOptions = {
  region?: string
}

export class RegionEndpoint implements TEndpointProvider {
  private readonly apiBaseUrl: string

  constructor(options: TRegionEndpointOptions = {}) {
    this.apiBaseUrl = `https://${resolveRegionHost(options.region)}`
  }

  getApiBase(): string {
    return this.apiBaseUrl
  }
}

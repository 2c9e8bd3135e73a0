import { type Mock, vi } from 'vitest'
import { RuckusOneClient, type TRuckusOneClientOptions } from '../../src/client/ruckus-one.ts'
import { ApiGateway, type TApiGatewayOptions } from '../../src/core/api-gateway.ts'
import type { TTokenProvider } from '../../src/core/types.ts'
import { TEST_CONFIG } from './constants.ts'
import type { TFetchMock } from './mocks/fetch.mock.ts'

export type TCreateClientOptions = Partial<TRuckusOneClientOptions>

/** Token provider that always hands out TEST_CONFIG.accessToken. */
export function createMockTokenProvider(): {
  getAuthHeaders: Mock<TTokenProvider['getAuthHeaders']>
} {
  return {
    getAuthHeaders: vi.fn<TTokenProvider['getAuthHeaders']>(async () => ({
      Authorization: `Bearer ${TEST_CONFIG.accessToken}`,
      'Content-Type': 'application/json',
    })),
  }
}

/**
 * Creates a gateway against the "na" region that answers from the given fetch mock.
 * All options can be overridden.
 */
export function createTestGateway(
  fetchMock: TFetchMock,
  overrides?: Partial<TApiGatewayOptions>,
): ApiGateway {
  return new ApiGateway({
    tokenProvider: createMockTokenProvider(),
    fetchImplementation: fetchMock.fetch,
    ...overrides,
  })
}

/**
 * Creates a RuckusOneClient with test credentials.
 * The first request through it performs the token exchange, so queue a token first.
 */
export function createTestClient(
  fetchMock: TFetchMock,
  overrides?: TCreateClientOptions,
): RuckusOneClient {
  return new RuckusOneClient({
    clientId: TEST_CONFIG.clientId,
    clientSecret: TEST_CONFIG.clientSecret,
    tenantId: TEST_CONFIG.tenantId,
    fetchImplementation: fetchMock.fetch,
    ...overrides,
  })
}

import type { TListQueryBody, TSortOrder } from '../types/api.ts'
import type { TJsonValue } from './types.ts'

export const DEFAULT_PAGE_SIZE = 100

export type TListOptions = {
  pageSize?: number
  page?: number
  /** Case-insensitive; sent upper-cased */
  sortOrder?: TSortOrder | Lowercase<TSortOrder>
  sortField?: string
  searchString?: string
  searchTargetFields?: string[]
  fields?: string[]
  filters?: TJsonValue
}

/** Builds the body of a `.../query` list call. Absent optional fields are omitted. */
export function buildListQuery(options: TListOptions = {}): TListQueryBody {
  const body: TListQueryBody = {
    pageSize: options.pageSize ?? DEFAULT_PAGE_SIZE,
    page: options.page ?? 0,
    sortOrder: options.sortOrder?.toUpperCase() === 'DESC' ? 'DESC' : 'ASC',
  }

  if (options.sortField) body.sortField = options.sortField
  if (options.searchString) body.searchString = options.searchString
  if (options.searchTargetFields?.length) body.searchTargetFields = options.searchTargetFields
  if (options.fields?.length) body.fields = options.fields
  if (options.filters !== undefined) body.filters = options.filters

  return body
}

export {
  paginate,
  paginateWhere,
  sequencePages,
  flattenPages,
} from "./paginate";
export type {
  Page,
  PageFetcher,
  PaginationHooks,
  PaginationOptions,
} from "./paginate";
export {
  FluentAsyncIterable,
  toArray,
  forEach,
  filter,
  map,
  take,
} from "./fluent";
export { FetchError, ConfigError } from "./errors";
export type { FetchErrorKind } from "./errors";
export {
  beerSchema,
  beerPageSchema,
  parseBeerPage,
  createBeerClient,
  strongerThan,
} from "./beer";
export type { Beer, BeerClientOptions, HttpFetch } from "./beer";
export { createApp } from "./server";
export type { AppOptions } from "./server";
export { loadConfig } from "./config";
export type { Config } from "./config";
export { createLogger } from "./logger";

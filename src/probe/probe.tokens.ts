import type { LookupAddress, LookupAllOptions } from 'node:dns';

export type LookupAll = (
  hostname: string,
  options: LookupAllOptions,
) => Promise<LookupAddress[]>;

export const DNS_LOOKUP = Symbol('DNS_LOOKUP');
/** Base delay before the first retry of an HTTP probe; doubles per attempt. */
export const RETRY_BACKOFF_MS = Symbol('RETRY_BACKOFF_MS');

import type { BlockReason, ProbeOutcome } from './types';

export const EMPTY_REDIRECT = '<empty>';

/**
 * Maps one probe response to its outcome category.
 *
 * Order matters: a zero status wins over everything, then the 3xx range,
 * then the two named codes, then the catch-all.
 */
export function classify(
  status: number | null | undefined,
  redirectTarget: string | null | undefined,
  timeoutSeconds: number,
  reason: BlockReason = 'timeout',
): ProbeOutcome {
  if (!status) return { kind: 'blocked', reason, timeoutSeconds };
  if (status >= 300 && status < 400) {
    const target = redirectTarget?.trim();
    return { kind: 'redirected', status, target: target || EMPTY_REDIRECT };
  }
  if (status === 200) return { kind: 'available', status: 200 };
  if (status === 403) return { kind: 'denied', status: 403 };
  return { kind: 'other_status', status };
}

/** Status as reported in the JSON document; blocked probes report 0. */
export function outcomeStatus(o: ProbeOutcome): number {
  return o.kind === 'blocked' ? 0 : o.status;
}

export function outcomeRedirect(o: ProbeOutcome): string | null {
  return o.kind === 'redirected' ? o.target : null;
}

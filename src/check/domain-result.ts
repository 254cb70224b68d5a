import type { IpVersion, ProbeSlots } from '../probe/types';

export type DomainErrorCode = 'nxdomain' | 'blocked_by_ip' | 'cancelled';

export type DomainError = { code: DomainErrorCode; message: string };

/** Either probe slots or an error record, never both. */
export type DomainResult =
  | {
      domain: string;
      kind: 'probed';
      address: string;
      family: IpVersion;
      reachable: true;
      probes: ProbeSlots;
    }
  | {
      domain: string;
      kind: 'error';
      address: string | null;
      reachable: boolean | null;
      error: DomainError;
    };

export const ERROR_MESSAGES: Record<DomainErrorCode, string> = {
  nxdomain: "Domain doesn't exist",
  blocked_by_ip: 'Blocked by IP (port 443 unreachable)',
  cancelled: 'Not checked, run was cancelled',
};

export function errorResult(
  domain: string,
  code: DomainErrorCode,
  address: string | null = null,
): DomainResult {
  return {
    domain,
    kind: 'error',
    address,
    reachable: code === 'blocked_by_ip' ? false : null,
    error: { code, message: ERROR_MESSAGES[code] },
  };
}

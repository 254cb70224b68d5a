export type Protocol = 'http' | 'https';
export type IpVersion = 4 | 6;
export type IpSlot = 'ipv4' | 'ipv6';

export type BlockReason = 'timeout' | 'transport_error';

export type ProbeOutcome =
  | { kind: 'available'; status: 200 }
  | { kind: 'redirected'; status: number; target: string }
  | { kind: 'denied'; status: 403 }
  | { kind: 'other_status'; status: number }
  | { kind: 'blocked'; reason: BlockReason; timeoutSeconds: number };

/**
 * What the executor saw on the wire. `status` is 0 when nothing usable came
 * back.
 */
export type ProbeResponse = {
  status: number;
  redirectTarget: string | null;
  failure?: BlockReason;
};

export type ProbeSlots = Partial<
  Record<Protocol, Partial<Record<IpSlot, ProbeOutcome>>>
>;

export const PROTOCOLS: readonly Protocol[] = ['http', 'https'];
export const IP_VERSIONS: readonly IpVersion[] = [4, 6];

export const ipSlot = (v: IpVersion): IpSlot => (v === 4 ? 'ipv4' : 'ipv6');

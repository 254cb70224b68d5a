import { ConfigError } from './config.error';
import type { IpVersion, Protocol } from '../probe/types';

export type Mode = 'dpi' | 'geoblock' | 'both';
export type ProtocolOption = Protocol | 'both';

export const MODES: readonly Mode[] = ['dpi', 'geoblock', 'both'];
export const PROTOCOL_OPTIONS: readonly ProtocolOption[] = [
  'http',
  'https',
  'both',
];

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:129.0) ' +
  'Gecko/20100101 Firefox/129.0';

export type ProxyAddress = { host: string; port: number };

/** Raw options as they come from the command line. */
export type ProbeOptions = {
  timeout?: number;
  retries?: number;
  mode?: string;
  userAgent?: string;
  file?: string;
  domain?: string;
  proxy?: string;
  ipv4?: boolean;
  ipv6?: boolean;
  protocol?: string;
  json?: boolean;
  concurrency?: number;
};

export type HostFacts = { ipv6Supported: boolean };

export type ProbeConfig = Readonly<{
  timeoutSeconds: number;
  retries: number;
  mode: Mode;
  userAgent: string;
  domainsFile: string | null;
  singleDomain: string | null;
  proxy: Readonly<ProxyAddress> | null;
  protocols: readonly Protocol[];
  ipVersions: readonly IpVersion[];
  /** Whether the host could actually reach IPv6 when the run started. */
  ipv6Available: boolean;
  jsonOutput: boolean;
  concurrency: number;
}>;

export const DEFAULTS: Readonly<{
  timeout: number;
  retries: number;
  mode: Mode;
  protocol: ProtocolOption;
  concurrency: number;
}> = {
  timeout: 5,
  retries: 2,
  mode: 'both',
  protocol: 'both',
  concurrency: 8,
};

const isMode = (v: string): v is Mode => MODES.some((m) => m === v);
const isProtocolOption = (v: string): v is ProtocolOption =>
  PROTOCOL_OPTIONS.some((p) => p === v);

/** Accepts `host:port` and `[v6addr]:port`. */
export function parseProxy(raw: string): ProxyAddress {
  const value = raw.trim().replace(/^socks5h?:\/\//i, '');
  const m = /^\[([0-9a-fA-F:.]+)\]:(\d+)$/.exec(value) ??
    /^([^\s:[\]]+):(\d+)$/.exec(value);
  if (!m) {
    throw new ConfigError(
      `Invalid proxy: ${raw}. Expected host:port, e.g. 127.0.0.1:1080`,
    );
  }
  const port = Number(m[2]);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`Invalid proxy port: ${m[2]}. Must be 1-65535`);
  }
  return { host: m[1], port };
}

export function formatProxy(p: ProxyAddress): string {
  return p.host.includes(':') ? `[${p.host}]:${p.port}` : `${p.host}:${p.port}`;
}

function integer(
  value: number | undefined,
  fallback: number,
  min: number,
  what: string,
): number {
  const v = value ?? fallback;
  if (!Number.isInteger(v) || v < min) {
    const rule = min > 0 ? 'a positive integer' : 'a non-negative integer';
    throw new ConfigError(`Invalid ${what} value: ${v}. Must be ${rule}`);
  }
  return v;
}

function pickIpVersions(opts: ProbeOptions, host: HostFacts): IpVersion[] {
  if (opts.ipv4 && opts.ipv6) {
    throw new ConfigError('Options -4 and -6 are mutually exclusive');
  }
  if (opts.ipv6) {
    if (!host.ipv6Supported) {
      throw new ConfigError(
        'IPv6 was requested but this host has no IPv6 connectivity',
      );
    }
    return [6];
  }
  if (opts.ipv4 || !host.ipv6Supported) return [4];
  return [4, 6];
}

/**
 * Validates raw options once, up front. The returned value is frozen and
 * shared read-only by every component of the run.
 */
export function buildProbeConfig(
  opts: ProbeOptions,
  host: HostFacts,
): ProbeConfig {
  const timeoutSeconds = integer(opts.timeout, DEFAULTS.timeout, 1, 'timeout');
  const retries = integer(opts.retries, DEFAULTS.retries, 0, 'retries');
  const concurrency = integer(
    opts.concurrency,
    DEFAULTS.concurrency,
    1,
    'concurrency',
  );

  const mode = opts.mode ?? DEFAULTS.mode;
  if (!isMode(mode)) {
    throw new ConfigError(
      `Invalid mode: ${mode}. Valid modes are: ${MODES.join(', ')}`,
    );
  }

  const protocol = opts.protocol ?? DEFAULTS.protocol;
  if (!isProtocolOption(protocol)) {
    const valid = PROTOCOL_OPTIONS.join(', ');
    throw new ConfigError(
      `Invalid protocol: ${protocol}. Valid values are: ${valid}`,
    );
  }
  const protocols: Protocol[] =
    protocol === 'both' ? ['http', 'https'] : [protocol];

  const userAgent = opts.userAgent ?? DEFAULT_USER_AGENT;
  if (!userAgent.trim()) throw new ConfigError('User-Agent cannot be empty');

  if (opts.file !== undefined && !opts.file.trim()) {
    throw new ConfigError('File path cannot be empty');
  }
  if (opts.domain !== undefined && !opts.domain.trim()) {
    throw new ConfigError('Domain cannot be empty');
  }
  if (opts.file && opts.domain) {
    throw new ConfigError('Options --file and --domain are mutually exclusive');
  }

  const ipVersions = pickIpVersions(opts, host);

  return Object.freeze({
    timeoutSeconds,
    retries,
    mode,
    userAgent,
    domainsFile: opts.file?.trim() || null,
    singleDomain: opts.domain?.trim() || null,
    proxy: opts.proxy ? Object.freeze(parseProxy(opts.proxy)) : null,
    protocols: Object.freeze(protocols),
    ipVersions: Object.freeze(ipVersions),
    ipv6Available: host.ipv6Supported,
    jsonOutput: Boolean(opts.json),
    concurrency,
  });
}

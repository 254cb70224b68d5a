import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import axios, { AxiosRequestConfig } from 'axios';
import http from 'node:http';
import https from 'node:https';
import type { Readable } from 'node:stream';
import { SocksProxyAgent } from 'socks-proxy-agent';
import { formatProxy, ProbeConfig } from '../config/probe-config';
import { RETRY_BACKOFF_MS } from './probe.tokens';
import type { BlockReason, IpVersion, ProbeResponse, Protocol } from './types';

const MAX_REDIRECTS = 20;

/** Headers that make the probe look like an ordinary browser visit. */
export const BROWSER_HEADERS: Readonly<Record<string, string>> = {
  'Sec-Fetch-Site': 'none',
  'Accept-Language': 'en-US,en;q=0.5',
  'Accept-Encoding': 'gzip, deflate, br, zstd',
};

type Agents = { httpAgent: http.Agent; httpsAgent: http.Agent };

type Failure = { reason: BlockReason; detail: string };

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

function failureOf(e: unknown): Failure {
  // the per-attempt deadline surfaces as a cancellation
  if (axios.isCancel(e)) {
    return { reason: 'timeout', detail: 'deadline exceeded' };
  }
  if (axios.isAxiosError(e)) {
    const timedOut = e.code === 'ECONNABORTED' || e.code === 'ETIMEDOUT';
    return {
      reason: timedOut ? 'timeout' : 'transport_error',
      detail: e.code ? `${e.code}: ${e.message}` : e.message,
    };
  }
  return {
    reason: 'transport_error',
    detail: e instanceof Error ? e.message : String(e),
  };
}

function headerString(v: unknown): string | null {
  if (typeof v === 'string') return v;
  if (Array.isArray(v) && typeof v[0] === 'string') return v[0];
  return null;
}

@Injectable()
export class HttpProbeService {
  private readonly logger = new Logger(HttpProbeService.name);
  private readonly backoffMs: number;

  constructor(@Optional() @Inject(RETRY_BACKOFF_MS) backoffMs?: number) {
    this.backoffMs = backoffMs ?? 1000;
  }

  /**
   * One GET against `{protocol}://{domain}` with the run's retry policy.
   * Each attempt has a wall-clock deadline of `timeoutSeconds`; the body is
   * never read. Never throws: a probe that never got an answer reports
   * status 0.
   */
  async probe(
    domain: string,
    protocol: Protocol,
    followRedirects: boolean,
    ipVersion: IpVersion,
    config: ProbeConfig,
  ): Promise<ProbeResponse> {
    const url = `${protocol}://${domain}`;
    const attempts = config.retries + 1;
    let last: Failure = { reason: 'timeout', detail: 'no attempt made' };

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const agents = this.agentsFor(config);
      try {
        const res = await axios.request<Readable>(
          this.requestConfig(url, followRedirects, ipVersion, config, agents),
        );
        res.data.destroy();
        const location = headerString(res.headers['location']);
        const redirected = res.status >= 300 && res.status < 400;
        this.logger.debug(
          `${url} IPv${ipVersion} -> ${res.status} (attempt ${attempt})`,
        );
        return {
          status: res.status,
          redirectTarget: redirected ? location : null,
        };
      } catch (e) {
        last = failureOf(e);
        this.logger.debug(
          `${url} IPv${ipVersion} attempt ${attempt}/${attempts} failed: ` +
            last.detail,
        );
      } finally {
        agents.httpAgent.destroy();
        agents.httpsAgent.destroy();
      }
      if (attempt < attempts && this.backoffMs > 0) {
        await sleep(this.backoffMs * 2 ** (attempt - 1));
      }
    }

    return { status: 0, redirectTarget: null, failure: last.reason };
  }

  private agentsFor(config: ProbeConfig): Agents {
    if (config.proxy) {
      const agent = new SocksProxyAgent(
        `socks5h://${formatProxy(config.proxy)}`,
        { timeout: config.timeoutSeconds * 1000 },
      );
      return { httpAgent: agent, httpsAgent: agent };
    }
    return {
      httpAgent: new http.Agent({ keepAlive: false }),
      httpsAgent: new https.Agent({ keepAlive: false }),
    };
  }

  private requestConfig(
    url: string,
    followRedirects: boolean,
    family: IpVersion,
    config: ProbeConfig,
    agents: Agents,
  ): AxiosRequestConfig {
    return {
      url,
      method: 'GET',
      // covers lookup, connect, TLS and every redirect hop
      signal: AbortSignal.timeout(config.timeoutSeconds * 1000),
      maxRedirects: followRedirects ? MAX_REDIRECTS : 0,
      validateStatus: () => true,
      responseType: 'stream',
      decompress: false,
      family,
      proxy: false,
      httpAgent: agents.httpAgent,
      httpsAgent: agents.httpsAgent,
      headers: { 'User-Agent': config.userAgent, ...BROWSER_HEADERS },
    };
  }
}

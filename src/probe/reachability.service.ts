import { Injectable, Logger } from '@nestjs/common';
import net from 'node:net';
import { SocksClient } from 'socks';
import type { ProxyAddress } from '../config/probe-config';

/** Connectivity is judged on the TLS port whatever protocols are probed. */
export const REACHABILITY_PORT = 443;

@Injectable()
export class ReachabilityService {
  private readonly logger = new Logger(ReachabilityService.name);

  /**
   * One TCP connect to `ip:port`, no retries. With a proxy the connect is a
   * SOCKS5 CONNECT issued by the proxy.
   */
  async isReachable(
    ip: string,
    port: number,
    timeoutMs: number,
    proxy: ProxyAddress | null = null,
  ): Promise<boolean> {
    try {
      if (proxy) await this.connectViaProxy(ip, port, timeoutMs, proxy);
      else await this.connect(ip, port, timeoutMs);
      return true;
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      this.logger.debug(`${ip}:${port} unreachable: ${reason}`);
      return false;
    }
  }

  private connect(host: string, port: number, timeoutMs: number) {
    return new Promise<void>((resolve, reject) => {
      const sock = net.connect({ host, port });
      const t = setTimeout(
        () => sock.destroy(new Error(`connect timeout after ${timeoutMs}ms`)),
        timeoutMs,
      );
      sock.once('connect', () => {
        clearTimeout(t);
        sock.end();
        resolve();
      });
      sock.once('error', (err) => {
        clearTimeout(t);
        reject(err);
      });
    });
  }

  private async connectViaProxy(
    host: string,
    port: number,
    timeoutMs: number,
    proxy: ProxyAddress,
  ) {
    const { socket } = await SocksClient.createConnection({
      proxy: { host: proxy.host, port: proxy.port, type: 5 },
      command: 'connect',
      destination: { host, port },
      timeout: timeoutMs,
    });
    socket.destroy();
  }
}

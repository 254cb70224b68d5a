import { Injectable, Logger } from '@nestjs/common';
import os from 'node:os';

type Interfaces = ReturnType<typeof os.networkInterfaces>;

/**
 * True when some interface carries a global (non loopback, non link-local)
 * IPv6 address.
 */
export function hasRoutableIpv6(interfaces: Interfaces): boolean {
  return Object.values(interfaces).some((list) =>
    (list ?? []).some(
      (i) =>
        i.family === 'IPv6' &&
        !i.internal &&
        !/^fe80:/i.test(i.address) &&
        !/^f[cd]/i.test(i.address),
    ),
  );
}

@Injectable()
export class HostCapabilitiesService {
  private readonly logger = new Logger(HostCapabilitiesService.name);

  supportsIpv6(): boolean {
    const ok = hasRoutableIpv6(os.networkInterfaces());
    this.logger.debug(`IPv6 connectivity: ${ok ? 'yes' : 'no'}`);
    return ok;
  }
}

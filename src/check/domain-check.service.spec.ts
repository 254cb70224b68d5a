import { Test } from '@nestjs/testing';
import { buildProbeConfig, ProbeConfig } from '../config/probe-config';
import { HttpProbeService } from '../probe/http-probe.service';
import { ReachabilityService } from '../probe/reachability.service';
import { ResolverService } from '../probe/resolver.service';
import type { ProbeResponse, Protocol } from '../probe/types';
import { resultEntry } from '../report/report-document';
import { silentLogger } from '../testing/silent-logger';
import { DomainCheckService, enabledPairs } from './domain-check.service';

describe('DomainCheckService', () => {
  const resolver = { resolve: jest.fn() };
  const reachability = { isReachable: jest.fn() };
  const executor = { probe: jest.fn() };
  let service: DomainCheckService;

  const v4host = { ipv6Supported: false };

  beforeEach(async () => {
    jest.resetAllMocks();
    const moduleRef = await Test.createTestingModule({
      providers: [
        DomainCheckService,
        { provide: ResolverService, useValue: resolver },
        { provide: ReachabilityService, useValue: reachability },
        { provide: HttpProbeService, useValue: executor },
      ],
    })
      .setLogger(silentLogger)
      .compile();
    service = moduleRef.get(DomainCheckService);
  });

  const resolvesTo = (address: string | null, family: 4 | 6 | null = 4) =>
    resolver.resolve.mockImplementation(async (domain: string) => ({
      domain,
      address,
      family,
    }));

  const answers = (byProtocol: Record<Protocol, ProbeResponse>) =>
    executor.probe.mockImplementation(
      async (_d: string, protocol: Protocol) => byProtocol[protocol],
    );

  it('stops at nxdomain without probing', async () => {
    resolvesTo(null, null);
    const config = buildProbeConfig({}, v4host);

    const result = await service.check('nope.invalid', config);

    expect(result).toEqual({
      domain: 'nope.invalid',
      kind: 'error',
      address: null,
      reachable: null,
      error: { code: 'nxdomain', message: "Domain doesn't exist" },
    });
    expect(resultEntry(result)).toEqual({
      service: 'nope.invalid',
      error: "Domain doesn't exist",
      error_code: 'nxdomain',
    });
    expect(reachability.isReachable).not.toHaveBeenCalled();
    expect(executor.probe).not.toHaveBeenCalled();
  });

  it('stops at blocked_by_ip when port 443 is unreachable', async () => {
    resolvesTo('203.0.113.7');
    reachability.isReachable.mockResolvedValue(false);
    const config = buildProbeConfig({ timeout: 3 }, v4host);

    const result = await service.check('blocked.test', config);

    expect(result).toEqual({
      domain: 'blocked.test',
      kind: 'error',
      address: '203.0.113.7',
      reachable: false,
      error: {
        code: 'blocked_by_ip',
        message: 'Blocked by IP (port 443 unreachable)',
      },
    });
    expect(reachability.isReachable).toHaveBeenCalledWith(
      '203.0.113.7',
      443,
      3000,
      null,
    );
    expect(executor.probe).not.toHaveBeenCalled();
  });

  it('checks port 443 even when only HTTP is probed', async () => {
    resolvesTo('203.0.113.7');
    reachability.isReachable.mockResolvedValue(true);
    answers({
      http: { status: 200, redirectTarget: null },
      https: { status: 200, redirectTarget: null },
    });
    const config = buildProbeConfig({ protocol: 'http' }, v4host);
    await service.check('a.test', config);
    expect(reachability.isReachable).toHaveBeenCalledWith(
      '203.0.113.7',
      443,
      5000,
      null,
    );
  });

  it('builds the record for redirecting HTTP and available HTTPS', async () => {
    resolvesTo('198.51.100.1');
    reachability.isReachable.mockResolvedValue(true);
    answers({
      http: { status: 301, redirectTarget: 'https://x' },
      https: { status: 200, redirectTarget: null },
    });
    const config = buildProbeConfig(
      { timeout: 5, retries: 2, protocol: 'both', mode: 'dpi' },
      v4host,
    );

    const result = await service.check('x', config);

    expect(result).toEqual({
      domain: 'x',
      kind: 'probed',
      address: '198.51.100.1',
      family: 4,
      reachable: true,
      probes: {
        http: {
          ipv4: { kind: 'redirected', status: 301, target: 'https://x' },
        },
        https: { ipv4: { kind: 'available', status: 200 } },
      },
    });
    expect(resultEntry(result)).toEqual({
      service: 'x',
      http: { ipv4: { status: 301, redirect_url: 'https://x' }, ipv6: null },
      https: { ipv4: { status: 200, redirect_url: null }, ipv6: null },
    });
    expect(executor.probe).toHaveBeenCalledWith('x', 'http', false, 4, config);
    expect(executor.probe).toHaveBeenCalledWith('x', 'https', true, 4, config);
    expect(resolver.resolve).toHaveBeenCalledWith('x', [4]);
  });

  it('leaves the https slot out when only http is configured', async () => {
    resolvesTo('198.51.100.1');
    reachability.isReachable.mockResolvedValue(true);
    answers({
      http: { status: 0, redirectTarget: null, failure: 'timeout' },
      https: { status: 200, redirectTarget: null },
    });

    const result = await service.check(
      'a.test',
      buildProbeConfig({ protocol: 'http' }, v4host),
    );

    if (result.kind !== 'probed') throw new Error('expected probes');
    expect(Object.keys(result.probes)).toEqual(['http']);
    expect(result.probes.http).toEqual({
      ipv4: { kind: 'blocked', reason: 'timeout', timeoutSeconds: 5 },
    });
    expect(executor.probe).toHaveBeenCalledTimes(1);
  });

  it('runs all four pairs on a dual-stack host', async () => {
    resolvesTo('2001:db8::1', 6);
    reachability.isReachable.mockResolvedValue(true);
    executor.probe.mockImplementation(
      async (_d: string, protocol: Protocol, _f: boolean, ipVersion: 4 | 6) =>
        protocol === 'http' && ipVersion === 6
          ? { status: 403, redirectTarget: null }
          : { status: 200, redirectTarget: null },
    );

    const result = await service.check(
      'dual.test',
      buildProbeConfig({}, { ipv6Supported: true }),
    );

    if (result.kind !== 'probed') throw new Error('expected probes');
    expect(result.probes).toEqual({
      http: {
        ipv4: { kind: 'available', status: 200 },
        ipv6: { kind: 'denied', status: 403 },
      },
      https: {
        ipv4: { kind: 'available', status: 200 },
        ipv6: { kind: 'available', status: 200 },
      },
    });
  });

  it('never fills an ipv6 slot when the host has no IPv6', async () => {
    resolvesTo('198.51.100.1');
    reachability.isReachable.mockResolvedValue(true);
    answers({
      http: { status: 200, redirectTarget: null },
      https: { status: 200, redirectTarget: null },
    });
    const requested: ProbeConfig = {
      ...buildProbeConfig({}, v4host),
      ipVersions: [4, 6],
      ipv6Available: false,
    };

    const result = await service.check('a.test', requested);

    if (result.kind !== 'probed') throw new Error('expected probes');
    expect(result.probes.http?.ipv6).toBeUndefined();
    expect(result.probes.https?.ipv6).toBeUndefined();
    expect(executor.probe).toHaveBeenCalledTimes(2);
  });

  it('records a crashing probe as blocked, siblings untouched', async () => {
    resolvesTo('198.51.100.1');
    reachability.isReachable.mockResolvedValue(true);
    executor.probe.mockImplementation(
      async (_d: string, protocol: Protocol) => {
        if (protocol === 'http') throw new Error('boom');
        return { status: 200, redirectTarget: null };
      },
    );

    const result = await service.check('a.test', buildProbeConfig({}, v4host));

    if (result.kind !== 'probed') throw new Error('expected probes');
    expect(result.probes).toEqual({
      http: {
        ipv4: {
          kind: 'blocked',
          reason: 'transport_error',
          timeoutSeconds: 5,
        },
      },
      https: { ipv4: { kind: 'available', status: 200 } },
    });
  });

  it('steps through the machine one transition at a time', async () => {
    resolvesTo('198.51.100.1');
    reachability.isReachable.mockResolvedValue(true);
    const config = buildProbeConfig({}, v4host);

    await expect(
      service.advance('a.test', { phase: 'resolving' }, config),
    ).resolves.toEqual({
      phase: 'reachability',
      address: '198.51.100.1',
      family: 4,
    });
    await expect(
      service.advance(
        'a.test',
        { phase: 'reachability', address: '198.51.100.1', family: 4 },
        config,
      ),
    ).resolves.toEqual({
      phase: 'probing',
      address: '198.51.100.1',
      family: 4,
    });
  });
});

describe('enabledPairs', () => {
  it('crosses protocols with usable IP versions', () => {
    const dual = { ipv6Supported: true };
    expect(enabledPairs(buildProbeConfig({}, dual))).toEqual([
      { protocol: 'http', ipVersion: 4 },
      { protocol: 'http', ipVersion: 6 },
      { protocol: 'https', ipVersion: 4 },
      { protocol: 'https', ipVersion: 6 },
    ]);
    expect(
      enabledPairs(buildProbeConfig({ protocol: 'https', ipv6: true }, dual)),
    ).toEqual([{ protocol: 'https', ipVersion: 6 }]);
  });
});

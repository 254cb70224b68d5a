import type { DomainResult } from '../check/domain-result';
import { formatProxy, ProbeConfig } from '../config/probe-config';
import { outcomeRedirect, outcomeStatus } from '../probe/classifier';
import { PROTOCOLS, ProbeOutcome } from '../probe/types';
import type {
  ProbeLeaf,
  Report,
  ReportDocument,
  ResultEntry,
} from './report.types';

const leaf = (o: ProbeOutcome | undefined): ProbeLeaf | null =>
  o ? { status: outcomeStatus(o), redirect_url: outcomeRedirect(o) } : null;

export function configParams(config: ProbeConfig): ReportDocument['params'] {
  const entries: [string, string][] = [
    ['timeout', String(config.timeoutSeconds)],
    ['retries', String(config.retries)],
    ['mode', config.mode],
    ['user_agent', config.userAgent],
    ['domains_file', config.domainsFile ?? ''],
    ['domain', config.singleDomain ?? ''],
    ['proxy', config.proxy ? formatProxy(config.proxy) : ''],
    ['protocol', config.protocols.join(',')],
    ['ip_version', config.ipVersions.join(',')],
    ['ipv6_available', String(config.ipv6Available)],
  ];
  return entries.map(([key, value]) => ({ key, value }));
}

export function resultEntry(r: DomainResult): ResultEntry {
  if (r.kind === 'error') {
    return {
      service: r.domain,
      error: r.error.message,
      error_code: r.error.code,
    };
  }
  const entry: ResultEntry = { service: r.domain };
  for (const protocol of PROTOCOLS) {
    const slots = r.probes[protocol];
    if (!slots) continue;
    entry[protocol] = { ipv4: leaf(slots.ipv4), ipv6: leaf(slots.ipv6) };
  }
  return entry;
}

export function toReportDocument(report: Report): ReportDocument {
  return {
    version: report.version,
    params: configParams(report.config),
    results: report.results.map(resultEntry),
  };
}

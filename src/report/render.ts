import dayjs from 'dayjs';
import type { DomainResult } from '../check/domain-result';
import { formatProxy, Mode } from '../config/probe-config';
import { domainSource } from '../domains/domains.service';
import { PROTOCOLS, ProbeOutcome } from '../probe/types';
import { toReportDocument } from './report-document';
import type { Report } from './report.types';

const COLORS = {
  white: '\x1b[97m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  blue: '\x1b[36m',
  orange: '\x1b[33m',
  reset: '\x1b[0m',
} as const;

type Color = Exclude<keyof typeof COLORS, 'reset'>;

export type RenderOptions = { color: boolean };

const SEPARATOR = '--------------------------------';

const MODE_TITLES: Record<Mode, string> = {
  dpi: 'DPI',
  geoblock: 'Geoblock',
  both: 'DPI and Geoblock',
};

/** Category word, its color and the remainder of the line. */
export function describeOutcome(o: ProbeOutcome): {
  label: string;
  color: Color;
  detail: string;
} {
  switch (o.kind) {
    case 'available':
      return { label: 'Available', color: 'green', detail: `(${o.status})` };
    case 'redirected':
      return {
        label: 'Redirected',
        color: 'blue',
        detail: `(${o.status}) to ${o.target}`,
      };
    case 'denied':
      return { label: 'Denied', color: 'red', detail: `(${o.status})` };
    case 'other_status':
      return {
        label: 'Responded',
        color: 'orange',
        detail: `with status code ${o.status}`,
      };
    case 'blocked':
      return o.reason === 'timeout'
        ? {
            label: 'Blocked',
            color: 'red',
            detail: `or site didn't respond after ${o.timeoutSeconds}s timeout`,
          }
        : {
            label: 'Blocked',
            color: 'red',
            detail: `or connection failed within ${o.timeoutSeconds}s timeout`,
          };
  }
}

function painter(opts: RenderOptions) {
  return (color: Color, text: string) =>
    opts.color ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

export function renderHeader(report: Report, opts: RenderOptions): string[] {
  const paint = painter(opts);
  const c = report.config;
  const source = domainSource(c);
  const lines = [
    `Timeout set to: ${paint('white', `${c.timeoutSeconds}s`)}`,
    `Retries set to: ${paint('white', String(c.retries))}`,
  ];
  if (source.kind === 'builtin') {
    lines.push(`Mode set to: ${paint('white', MODE_TITLES[source.mode])}`);
  }
  lines.push(`User-Agent set to: ${paint('white', c.userAgent)}`);
  const domainMode =
    source.kind === 'file'
      ? `user domains from ${source.path}`
      : source.kind === 'single'
        ? `single domain ${source.domain}`
        : 'predefined domains';
  lines.push(`Domain mode set to: ${paint('white', domainMode)}`);
  const protocols = c.protocols.map((p) => p.toUpperCase()).join(', ');
  lines.push(`Protocols set to: ${paint('white', protocols)}`);
  const ipVersions = c.ipVersions.map((v) => `IPv${v}`).join(', ');
  lines.push(
    `IP versions set to: ${paint('white', ipVersions)}` +
      (c.ipv6Available ? '' : ' (no IPv6 on this host)'),
  );
  if (c.proxy) {
    const proxy = `socks5://${formatProxy(c.proxy)}`;
    lines.push(`Proxy set to: ${paint('white', proxy)}`);
  }
  return lines;
}

export function renderDomain(r: DomainResult, opts: RenderOptions): string[] {
  const paint = painter(opts);
  const lines = [`Testing ${paint('white', r.domain)}:`];
  if (r.kind === 'error') {
    const color: Color = r.error.code === 'nxdomain' ? 'orange' : 'red';
    lines.push(`  ${paint(color, r.error.message)}`);
    return lines;
  }
  for (const protocol of PROTOCOLS) {
    const slots = r.probes[protocol];
    if (!slots) continue;
    for (const [slot, outcome] of [
      ['IPv4', slots.ipv4],
      ['IPv6', slots.ipv6],
    ] as const) {
      if (!outcome) continue;
      const { label, color, detail } = describeOutcome(outcome);
      const name = paint('white', `${protocol.toUpperCase()} (${slot})`);
      lines.push(`  ${name}: ${paint(color, label)} ${detail}`);
    }
  }
  return lines;
}

export function renderText(report: Report, opts: RenderOptions): string {
  const lines = renderHeader(report, opts);
  for (const r of report.results) {
    lines.push('', SEPARATOR, '', ...renderDomain(r, opts));
  }
  const took = dayjs(report.finishedAt).diff(dayjs(report.startedAt), 'second');
  lines.push('', SEPARATOR, '', `Finished in ${took}s`);
  return lines.join('\n') + '\n';
}

export function renderJson(report: Report): string {
  return JSON.stringify(toReportDocument(report), null, 2) + '\n';
}

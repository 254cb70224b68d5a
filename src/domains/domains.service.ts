import { Injectable, Logger } from '@nestjs/common';
import fs from 'node:fs/promises';
import { domainToASCII } from 'node:url';
import { ConfigError } from '../config/config.error';
import type { ProbeConfig } from '../config/probe-config';
import { builtinDomains } from './builtin-lists';

/** One domain per line; `#` comments and blank lines dropped, rest trimmed. */
export function parseDomainList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('#'));
}

/** `https://Example.COM/path` -> `example.com`; null when unusable. */
export function normalizeDomain(raw: string): string | null {
  const stripped = raw
    .trim()
    .toLowerCase()
    .replace(/^https?:\/\//, '')
    .replace(/[/?#].*$/, '')
    .replace(/\.$/, '');
  if (!stripped) return null;
  const ascii = domainToASCII(stripped);
  if (!ascii || !/^[a-z0-9.-]+$/.test(ascii)) return null;
  const labels = ascii.split('.');
  if (labels.some((label) => !label || label.length > 63)) return null;
  return ascii;
}

export type DomainSource =
  | { kind: 'single'; domain: string }
  | { kind: 'file'; path: string }
  | { kind: 'builtin'; mode: ProbeConfig['mode'] };

export function domainSource(config: ProbeConfig): DomainSource {
  if (config.singleDomain) {
    return { kind: 'single', domain: config.singleDomain };
  }
  if (config.domainsFile) return { kind: 'file', path: config.domainsFile };
  return { kind: 'builtin', mode: config.mode };
}

@Injectable()
export class DomainsService {
  private readonly logger = new Logger(DomainsService.name);

  async load(config: ProbeConfig): Promise<string[]> {
    const source = domainSource(config);
    const raw = await this.rawDomains(source);
    if (raw.length === 0) {
      throw new ConfigError(
        source.kind === 'file'
          ? `File '${source.path}' contains no domains`
          : 'No domains to check',
      );
    }
    const domains = raw.map((entry) => {
      const d = normalizeDomain(entry);
      if (!d) throw new ConfigError(`Invalid domain: ${entry}`);
      return d;
    });
    this.logger.log(
      `Loaded ${domains.length} domain(s) from ${source.kind} source`,
    );
    return domains;
  }

  private async rawDomains(source: DomainSource): Promise<string[]> {
    switch (source.kind) {
      case 'single':
        return [source.domain];
      case 'builtin':
        return builtinDomains(source.mode);
      case 'file':
        return parseDomainList(await this.readFile(source.path));
    }
  }

  private async readFile(path: string): Promise<string> {
    try {
      return await fs.readFile(path, 'utf8');
    } catch (e) {
      const code = e instanceof Error && 'code' in e ? String(e.code) : '';
      const reason = e instanceof Error ? e.message : String(e);
      throw new ConfigError(
        code === 'ENOENT'
          ? `File '${path}' does not exist`
          : `Cannot read file '${path}': ${reason}`,
      );
    }
  }
}

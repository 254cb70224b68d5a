import type { DomainResult } from '../check/domain-result';
import type { ProbeConfig } from '../config/probe-config';

export type Report = Readonly<{
  version: string;
  config: ProbeConfig;
  startedAt: string;
  finishedAt: string;
  results: readonly DomainResult[];
}>;

export type ProbeLeaf = { status: number; redirect_url: string | null };

export type ProtocolEntry = { ipv4: ProbeLeaf | null; ipv6: ProbeLeaf | null };

export type ResultEntry = {
  service: string;
  error?: string;
  error_code?: string;
  http?: ProtocolEntry;
  https?: ProtocolEntry;
};

/** Serializable shape handed to JSON consumers. */
export type ReportDocument = {
  version: string;
  params: { key: string; value: string }[];
  results: ResultEntry[];
};

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import {
  DEFAULT_USER_AGENT,
  DEFAULTS,
  MODES,
  PROTOCOL_OPTIONS,
  ProbeOptions,
} from '../config/probe-config';

export type CliOptions = ProbeOptions & { verbose: boolean };

/** yargs reads `-4`/`-6` as negative numbers; map them to long forms first. */
const SHORT_IP_FLAGS: Record<string, string> = {
  '-4': '--ipv4',
  '-6': '--ipv6',
};

export function parseArgs(argv: string[] = process.argv): CliOptions {
  const args = yargs(hideBin(argv).map((a) => SHORT_IP_FLAGS[a] ?? a))
    .scriptName('censorprobe')
    .usage(
      '$0 [options]\n\nChecks accessibility of websites that might be ' +
        'blocked by DPI or geolocation restrictions',
    )
    .option('mode', {
      alias: 'm',
      type: 'string',
      choices: MODES,
      default: DEFAULTS.mode,
      describe: 'Built-in list to check',
    })
    .option('timeout', {
      alias: 't',
      type: 'number',
      default: DEFAULTS.timeout,
      describe: 'Connection timeout in seconds',
    })
    .option('retries', {
      alias: 'r',
      type: 'number',
      default: DEFAULTS.retries,
      describe: 'Number of connection retries',
    })
    .option('user-agent', {
      alias: 'u',
      type: 'string',
      default: DEFAULT_USER_AGENT,
      describe: 'User-Agent header',
    })
    .option('file', {
      alias: 'f',
      type: 'string',
      describe: 'Read domains from a file, one per line, # for comments',
    })
    .option('domain', {
      alias: 'd',
      type: 'string',
      describe: 'Check a single domain',
    })
    .option('proxy', {
      alias: 'p',
      type: 'string',
      describe: 'SOCKS5 proxy as host:port',
    })
    .option('ipv4', {
      type: 'boolean',
      default: false,
      describe: 'Probe over IPv4 only (-4)',
    })
    .option('ipv6', {
      type: 'boolean',
      default: false,
      describe: 'Probe over IPv6 only (-6)',
    })
    .option('protocol', {
      type: 'string',
      choices: PROTOCOL_OPTIONS,
      default: DEFAULTS.protocol,
      describe: 'Protocols to probe',
    })
    .option('json', {
      alias: 'j',
      type: 'boolean',
      default: false,
      describe: 'Print the report as JSON',
    })
    .option('concurrency', {
      alias: 'c',
      type: 'number',
      default: DEFAULTS.concurrency,
      describe: 'Domains checked in parallel',
    })
    .option('verbose', {
      alias: 'v',
      type: 'boolean',
      default: false,
      describe: 'Log progress and probe details to stdout',
    })
    .example('$0 --mode dpi', 'Check only DPI-blocked sites')
    .example('$0 --timeout 10 --retries 3', 'Longer timeout and more retries')
    .example('$0 --file my-domains.txt', 'Check domains from a file')
    .example(
      '$0 -d example.com --protocol https -j',
      'One domain, HTTPS only, JSON output',
    )
    .strict()
    .help()
    .alias('help', 'h')
    .parseSync();

  return {
    mode: args.mode,
    timeout: args.timeout,
    retries: args.retries,
    userAgent: args['user-agent'],
    file: args.file,
    domain: args.domain,
    proxy: args.proxy,
    ipv4: args.ipv4,
    ipv6: args.ipv6,
    protocol: args.protocol,
    json: args.json,
    concurrency: args.concurrency,
    verbose: args.verbose,
  };
}

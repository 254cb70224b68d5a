#!/usr/bin/env node
import 'reflect-metadata';
import { Logger, LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { CliOptions, parseArgs } from './cli/options';
import { ConfigError } from './config/config.error';
import { buildProbeConfig, formatProxy } from './config/probe-config';
import { DomainsService } from './domains/domains.service';
import { HostCapabilitiesService } from './host/host-capabilities.service';
import { ReachabilityService } from './probe/reachability.service';
import { renderJson, renderText } from './report/render';
import { ReportService } from './report/report.service';

function logLevels(opts: CliOptions): LogLevel[] {
  if (opts.json) return ['error'];
  return opts.verbose ? ['error', 'warn', 'log', 'debug'] : ['error', 'warn'];
}

async function bootstrap() {
  const opts = parseArgs();
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: logLevels(opts),
  });
  const logger = new Logger('Main');

  const abort = new AbortController();
  const onSigint = () => {
    logger.warn('Interrupted, letting in-flight probes finish');
    abort.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    const host = app.get(HostCapabilitiesService);
    const config = buildProbeConfig(opts, {
      ipv6Supported: host.supportsIpv6(),
    });

    if (config.proxy) {
      const ok = await app
        .get(ReachabilityService)
        .isReachable(
          config.proxy.host,
          config.proxy.port,
          config.timeoutSeconds * 1000,
        );
      if (!ok) {
        throw new ConfigError(
          `Proxy ${formatProxy(config.proxy)} is not reachable`,
        );
      }
    }

    const domains = await app.get(DomainsService).load(config);
    const report = await app
      .get(ReportService)
      .run(domains, config, abort.signal);

    process.stdout.write(
      config.jsonOutput
        ? renderJson(report)
        : renderText(report, {
            color: Boolean(process.stdout.isTTY) && !process.env.NO_COLOR,
          }),
    );
    if (abort.signal.aborted) process.exitCode = 130;
  } finally {
    process.removeListener('SIGINT', onSigint);
    await app.close();
  }
}

bootstrap().catch((e: unknown) => {
  if (e instanceof ConfigError) {
    process.stderr.write(`[ERROR] ${e.message}\nRun with --help for usage.\n`);
  } else {
    process.stderr.write(
      `[FATAL] ${e instanceof Error ? (e.stack ?? e.message) : String(e)}\n`,
    );
  }
  process.exitCode = 1;
});

import { Inject, Injectable, Logger } from '@nestjs/common';
import dayjs from 'dayjs';
import { defer, from, lastValueFrom, of } from 'rxjs';
import { map, mergeMap, tap, toArray } from 'rxjs/operators';
import { DomainCheckService } from '../check/domain-check.service';
import { DomainResult, errorResult } from '../check/domain-result';
import type { ProbeConfig } from '../config/probe-config';
import { APP_VERSION } from '../version';
import type { Report } from './report.types';

@Injectable()
export class ReportService {
  private readonly logger = new Logger(ReportService.name);

  constructor(
    private readonly checker: DomainCheckService,
    @Inject(APP_VERSION) private readonly version: string,
  ) {}

  /**
   * Checks every domain through a pool of `config.concurrency` workers.
   * Results keep input order. Once `signal` aborts no new domain starts;
   * the ones never started are recorded as cancelled.
   */
  async run(
    domains: readonly string[],
    config: ProbeConfig,
    signal?: AbortSignal,
  ): Promise<Report> {
    const startedAt = dayjs();
    const results = new Array<DomainResult>(domains.length);
    let done = 0;

    await lastValueFrom(
      from(domains.map((domain, index) => ({ domain, index }))).pipe(
        mergeMap(
          ({ domain, index }) =>
            (signal?.aborted
              ? of(errorResult(domain, 'cancelled'))
              : defer(() => this.checker.check(domain, config))
            ).pipe(map((result) => ({ index, result }))),
          config.concurrency,
        ),
        tap(({ index, result }) => {
          results[index] = result;
          done += 1;
          const state =
            result.kind === 'error' ? result.error.code : 'probed';
          this.logger.log(
            `[${done}/${domains.length}] ${result.domain}: ${state}`,
          );
        }),
        toArray(),
      ),
    );

    const finishedAt = dayjs();
    const took = finishedAt.diff(startedAt, 'second', true).toFixed(1);
    this.logger.log(`Checked ${domains.length} domain(s) in ${took}s`);

    return Object.freeze({
      version: this.version,
      config,
      startedAt: startedAt.format(),
      finishedAt: finishedAt.format(),
      results: Object.freeze(results),
    });
  }
}

import { Module } from '@nestjs/common';
import { DomainsModule } from './domains/domains.module';
import { HostModule } from './host/host.module';
import { ProbeModule } from './probe/probe.module';
import { ReportModule } from './report/report.module';

@Module({
  imports: [HostModule, DomainsModule, ProbeModule, ReportModule],
})
export class AppModule {}

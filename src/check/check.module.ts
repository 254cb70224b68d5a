import { Module } from '@nestjs/common';
import { ProbeModule } from '../probe/probe.module';
import { DomainCheckService } from './domain-check.service';

@Module({
  imports: [ProbeModule],
  providers: [DomainCheckService],
  exports: [DomainCheckService],
})
export class CheckModule {}

import { Module } from '@nestjs/common';
import { CheckModule } from '../check/check.module';
import { APP_VERSION, packageVersion } from '../version';
import { ReportService } from './report.service';

@Module({
  imports: [CheckModule],
  providers: [
    { provide: APP_VERSION, useFactory: packageVersion },
    ReportService,
  ],
  exports: [ReportService],
})
export class ReportModule {}

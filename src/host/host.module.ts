import { Module } from '@nestjs/common';
import { HostCapabilitiesService } from './host-capabilities.service';

@Module({
  providers: [HostCapabilitiesService],
  exports: [HostCapabilitiesService],
})
export class HostModule {}

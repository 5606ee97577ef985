import { Module } from '@nestjs/common';
import { ApiKeyGuard } from '../auth/api-key.guard';
import { ActivityLogService } from './activity-log.service';
import { CLOCK, systemClock } from './clock';
import { CommandQueueService } from './command-queue.service';
import { ControlController } from './control.controller';
import { DeviceController } from './device.controller';
import { DeviceRegistryService } from './device-registry.service';
import { FleetSweepService } from './fleet-sweep.service';
import { FleetService } from './fleet.service';
import { StatusController } from './status.controller';

@Module({
  controllers: [DeviceController, ControlController, StatusController],
  providers: [
    { provide: CLOCK, useValue: systemClock },
    ActivityLogService,
    DeviceRegistryService,
    CommandQueueService,
    FleetService,
    FleetSweepService,
    ApiKeyGuard,
  ],
  exports: [FleetService],
})
export class FleetModule {}

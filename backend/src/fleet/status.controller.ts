import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { FleetService } from './fleet.service';

@ApiTags('status')
@Controller('api/status')
export class StatusController {
  constructor(private readonly fleetService: FleetService) {}

  @Get('all')
  @ApiOperation({ summary: 'Complete fleet status with recent activity' })
  getAll() {
    return this.fleetService.getFleetStatus();
  }

  @Get('analytics')
  @ApiOperation({ summary: 'Aggregated fleet analytics' })
  getAnalytics() {
    return this.fleetService.getAnalytics();
  }
}

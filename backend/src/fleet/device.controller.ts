import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiTags } from '@nestjs/swagger';
import { ActivityDto, HeartbeatDto } from './dtos';
import { FleetService } from './fleet.service';

@ApiTags('device')
@Controller('api/device')
export class DeviceController {
  constructor(private readonly fleetService: FleetService) {}

  @Post(':deviceId/heartbeat')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Report liveness and status (agents send this every 30 seconds)' })
  @ApiBody({ type: HeartbeatDto, required: false })
  heartbeat(@Param('deviceId') deviceId: string, @Body() report: unknown) {
    return this.fleetService.recordHeartbeat(deviceId, report);
  }

  @Post(':deviceId/activity')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Report a completed action' })
  @ApiBody({ type: ActivityDto, required: false })
  activity(@Param('deviceId') deviceId: string, @Body() report: unknown) {
    this.fleetService.logActivity(deviceId, report);
    return { success: true };
  }

  @Get(':deviceId/commands')
  @ApiOperation({ summary: 'Collect pending commands (agents poll every 10 seconds)' })
  commands(@Param('deviceId') deviceId: string) {
    return this.fleetService.pollCommands(deviceId);
  }
}

import { Body, Controller, HttpCode, HttpStatus, Param, Post, UseGuards } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiTags } from '@nestjs/swagger';
import { ApiKeyGuard } from '../auth/api-key.guard';
import { FleetService } from './fleet.service';

@ApiTags('control')
@Controller('api/control')
@UseGuards(ApiKeyGuard)
export class ControlController {
  constructor(private readonly fleetService: FleetService) {}

  @Post('stop/:deviceId')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Stop a specific device' })
  stop(@Param('deviceId') deviceId: string) {
    this.fleetService.stopDevice(deviceId);
    return { success: true, message: `Stop command sent to ${deviceId}` };
  }

  @Post('restart/:deviceId')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Restart a specific device; the body is passed through as command parameters' })
  @ApiBody({ required: false, schema: { type: 'object', additionalProperties: true } })
  restart(@Param('deviceId') deviceId: string, @Body() params: unknown) {
    this.fleetService.restartDevice(deviceId, params);
    return { success: true, message: `Restart command sent to ${deviceId}` };
  }

  @Post('emergency_stop_all')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Stop every registered device immediately' })
  emergencyStopAll() {
    const devices = this.fleetService.emergencyStopAll();
    return {
      success: true,
      message: `Emergency stop sent to ${devices.length} devices`,
      devices,
    };
  }
}

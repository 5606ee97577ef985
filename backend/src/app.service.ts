import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from './config/configuration';

@Injectable()
export class AppService {
  constructor(private readonly configService: ConfigService<AppConfig, true>) {}

  getInfo() {
    const app = this.configService.get('app', { infer: true });
    return {
      service: app.name,
      version: app.version,
      status: 'running',
      timestamp: new Date().toISOString(),
      endpoints: {
        device_heartbeat: '/api/device/<id>/heartbeat [POST]',
        device_activity: '/api/device/<id>/activity [POST]',
        device_commands: '/api/device/<id>/commands [GET]',
        control_stop: '/api/control/stop/<id> [POST]',
        control_restart: '/api/control/restart/<id> [POST]',
        emergency_stop: '/api/control/emergency_stop_all [POST]',
        fleet_status: '/api/status/all [GET]',
        analytics: '/api/status/analytics [GET]',
      },
    };
  }
}

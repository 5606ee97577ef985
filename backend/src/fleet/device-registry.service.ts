import { Inject, Injectable, InternalServerErrorException } from '@nestjs/common';
import { ActivityLogService } from './activity-log.service';
import { CLOCK, Clock } from './clock';
import { DeviceStatus, FleetSnapshot, HeartbeatReport } from './types';

@Injectable()
export class DeviceRegistryService {
  private statuses: Map<string, DeviceStatus> = new Map();

  constructor(
    private readonly activityLog: ActivityLogService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /**
   * Creates or replaces the status row for a device. Report fields are stored
   * as sent, an explicit null included; only absent ones fall back to defaults.
   */
  recordHeartbeat(deviceId: string, report: HeartbeatReport): DeviceStatus {
    const reported = (field: keyof HeartbeatReport, fallback: unknown): unknown =>
      field in report ? report[field] : fallback;

    const status: DeviceStatus = {
      status: 'online',
      last_seen: this.clock.now().toISOString(),
      uptime_hours: reported('uptime_hours', 0),
      cpu_usage: reported('cpu_usage', 0),
      memory_usage: reported('memory_usage', 0),
      actions_today: reported('actions_today', {}),
      next_scheduled: reported('next_scheduled', null),
      content_version: reported('content_version', 'unknown'),
      twitter_logged_in: reported('twitter_logged_in', false),
      last_activity: this.activityLog.mostRecentTimestamp(deviceId),
    };

    this.statuses.set(deviceId, status);
    return { ...status };
  }

  touchLastActivity(deviceId: string, timestamp: string): void {
    const status = this.statuses.get(deviceId);
    if (status) {
      status.last_activity = timestamp;
    }
  }

  /**
   * Drops every device whose last heartbeat is more than `thresholdMs` before
   * `now`. Activity logs and command queues are left alone.
   */
  evictStale(now: Date, thresholdMs: number): string[] {
    const stale: string[] = [];

    for (const [deviceId, status] of this.statuses.entries()) {
      const lastSeen = Date.parse(status.last_seen);
      if (Number.isNaN(lastSeen)) {
        throw new InternalServerErrorException(
          `Invalid last_seen timestamp for device ${deviceId}: ${status.last_seen}`,
        );
      }
      if (now.getTime() - lastSeen > thresholdMs) {
        stale.push(deviceId);
      }
    }

    for (const deviceId of stale) {
      this.statuses.delete(deviceId);
    }
    return stale;
  }

  snapshotAll(): FleetSnapshot {
    const devices: Record<string, DeviceStatus> = {};
    let onlineDevices = 0;

    for (const [deviceId, status] of this.statuses.entries()) {
      devices[deviceId] = { ...status };
      if (status.status === 'online') {
        onlineDevices++;
      }
    }

    return { devices, totalDevices: this.statuses.size, onlineDevices };
  }

  deviceIds(): string[] {
    return Array.from(this.statuses.keys());
  }
}

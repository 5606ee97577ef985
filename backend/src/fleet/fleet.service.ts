import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { isObject } from 'class-validator';
import { AppConfig } from '../config/configuration';
import { AnalyticsUtils } from '../utils/analytics.utils';
import { ActivityLogService } from './activity-log.service';
import { CLOCK, Clock } from './clock';
import { CommandQueueService } from './command-queue.service';
import { DeviceRegistryService } from './device-registry.service';
import {
  ActivityEntry,
  ActivityReport,
  COMMAND_ACTIONS,
  DeviceCommand,
  DeviceStatus,
  FleetAnalytics,
  HeartbeatReport,
} from './types';

@Injectable()
export class FleetService {
  private readonly logger = new Logger(FleetService.name);
  private readonly staleThresholdMs: number;
  private readonly topPerformerCount: number;

  constructor(
    private readonly registry: DeviceRegistryService,
    private readonly activityLog: ActivityLogService,
    private readonly commandQueue: CommandQueueService,
    configService: ConfigService<AppConfig, true>,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    const fleet = configService.get('fleet', { infer: true });
    this.staleThresholdMs = fleet.staleThresholdMs;
    this.topPerformerCount = fleet.topPerformerCount;
  }

  // ===== Device-facing =====

  recordHeartbeat(deviceId: string, body: unknown): { success: true; timestamp: string } {
    const report = isObject<HeartbeatReport>(body) ? body : {};
    const status = this.registry.recordHeartbeat(deviceId, report);

    this.logger.log(`Heartbeat from ${deviceId}: ${JSON.stringify(status.actions_today)}`);
    return { success: true, timestamp: this.timestamp() };
  }

  logActivity(deviceId: string, body: unknown): ActivityEntry {
    const report = isObject<ActivityReport>(body) ? body : {};
    const entry = this.activityLog.append(deviceId, report);
    this.registry.touchLastActivity(deviceId, entry.timestamp);

    this.logger.log(`Activity from ${deviceId}: ${entry.action}`);
    return entry;
  }

  pollCommands(deviceId: string): { commands: DeviceCommand[]; timestamp: string } {
    const commands = this.commandQueue.drain(deviceId);
    if (commands.length > 0) {
      this.logger.log(`Sending ${commands.length} commands to ${deviceId}`);
    }
    return { commands, timestamp: this.timestamp() };
  }

  // ===== Operator controls =====

  stopDevice(deviceId: string): DeviceCommand {
    const command = this.commandQueue.enqueue(deviceId, COMMAND_ACTIONS.STOP, {
      reason: 'Manual stop from Control Room',
    });
    this.logger.log(`Stop command queued for ${deviceId}`);
    return command;
  }

  restartDevice(deviceId: string, body: unknown): DeviceCommand {
    const params = isObject<Record<string, unknown>>(body) ? body : {};
    const command = this.commandQueue.enqueue(deviceId, COMMAND_ACTIONS.RESTART, params);
    this.logger.log(`Restart command queued for ${deviceId}`);
    return command;
  }

  /** Targets the devices registered right now; later registrations are not included. */
  emergencyStopAll(): string[] {
    const targets = this.commandQueue.broadcast(this.registry.deviceIds(), COMMAND_ACTIONS.EMERGENCY_STOP, {
      priority: 'critical',
    });
    this.logger.warn(`Emergency stop sent to ${targets.length} devices`);
    return targets;
  }

  // ===== Monitoring =====

  evictStale(): string[] {
    const evicted = this.registry.evictStale(this.clock.now(), this.staleThresholdMs);
    if (evicted.length > 0) {
      this.logger.log(`Evicted ${evicted.length} stale devices: ${evicted.join(', ')}`);
    }
    return evicted;
  }

  getFleetStatus(): {
    timestamp: string;
    devices: Record<string, DeviceStatus>;
    recent_activities: Record<string, ActivityEntry[]>;
    total_devices: number;
    online_devices: number;
  } {
    this.evictStale();
    const snapshot = this.registry.snapshotAll();

    return {
      timestamp: this.timestamp(),
      devices: snapshot.devices,
      recent_activities: this.activityLog.snapshotAll(),
      total_devices: snapshot.totalDevices,
      online_devices: snapshot.onlineDevices,
    };
  }

  getAnalytics(): { timestamp: string; analytics: FleetAnalytics } {
    this.evictStale();
    const snapshot = this.registry.snapshotAll();

    return {
      timestamp: this.timestamp(),
      analytics: AnalyticsUtils.buildFleetAnalytics(snapshot.devices, this.topPerformerCount),
    };
  }

  private timestamp(): string {
    return this.clock.now().toISOString();
  }
}

import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { ManualClock } from '../../test/utils/manual-clock';
import { createTestConfig } from '../../test/utils/test-config';
import { ActivityLogService } from './activity-log.service';
import { CLOCK } from './clock';
import { CommandQueueService } from './command-queue.service';
import { DeviceRegistryService } from './device-registry.service';
import { FleetService } from './fleet.service';

describe('FleetService', () => {
  let service: FleetService;
  let clock: ManualClock;

  beforeEach(async () => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    clock = new ManualClock('2025-03-01T12:00:00.000Z');

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        FleetService,
        DeviceRegistryService,
        ActivityLogService,
        CommandQueueService,
        { provide: ConfigService, useValue: createTestConfig() },
        { provide: CLOCK, useValue: clock },
      ],
    }).compile();

    service = module.get<FleetService>(FleetService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('device-facing operations', () => {
    it('acknowledges a heartbeat with the current time', () => {
      expect(service.recordHeartbeat('bot_alpha', { uptime_hours: 1 })).toEqual({
        success: true,
        timestamp: '2025-03-01T12:00:00.000Z',
      });
      expect(service.getFleetStatus().devices.bot_alpha.uptime_hours).toBe(1);
    });

    it('treats a non-object heartbeat body as an empty report', () => {
      service.recordHeartbeat('bot_alpha', 'not a report');

      expect(service.getFleetStatus().devices.bot_alpha.content_version).toBe('unknown');
    });

    it('updates last_activity of a registered device when it reports an action', () => {
      service.recordHeartbeat('bot_alpha', {});
      clock.advance(2_000);
      service.logActivity('bot_alpha', { action: 'tweet', success: true });

      const status = service.getFleetStatus();
      expect(status.devices.bot_alpha.last_activity).toBe('2025-03-01T12:00:02.000Z');
      expect(status.recent_activities.bot_alpha[0]).toMatchObject({ action: 'tweet', success: true });
    });

    it('keeps activity from a device that never sent a heartbeat', () => {
      service.logActivity('bot_quiet', { action: 'reply' });

      const status = service.getFleetStatus();
      expect(status.devices).toEqual({});
      expect(status.recent_activities.bot_quiet).toHaveLength(1);
    });

    it('returns no commands for an unknown device', () => {
      expect(service.pollCommands('bot_ghost')).toEqual({
        commands: [],
        timestamp: '2025-03-01T12:00:00.000Z',
      });
    });
  });

  describe('operator controls', () => {
    it('queues a stop command, even before the device has registered', () => {
      service.stopDevice('bot_new');

      const { commands } = service.pollCommands('bot_new');
      expect(commands).toHaveLength(1);
      expect(commands[0]).toMatchObject({
        action: 'stop_bot',
        parameters: { reason: 'Manual stop from Control Room' },
      });
      expect(service.pollCommands('bot_new').commands).toEqual([]);
    });

    it('passes restart parameters through and ignores a non-object body', () => {
      service.restartDevice('bot_alpha', { delay_seconds: 30 });
      service.restartDevice('bot_alpha', ['not', 'params']);

      const { commands } = service.pollCommands('bot_alpha');
      expect(commands.map((command) => command.parameters)).toEqual([{ delay_seconds: 30 }, {}]);
    });

    it('sends an emergency stop to every registered device and no one else', () => {
      service.recordHeartbeat('bot_a', {});
      service.recordHeartbeat('bot_b', {});
      service.recordHeartbeat('bot_c', {});

      const targets = service.emergencyStopAll();
      service.recordHeartbeat('bot_d', {});

      expect(targets).toEqual(['bot_a', 'bot_b', 'bot_c']);
      const delivered = targets.map((deviceId) => service.pollCommands(deviceId).commands);
      delivered.forEach((commands) => {
        expect(commands).toHaveLength(1);
        expect(commands[0].action).toBe('emergency_stop');
        expect(commands[0].parameters).toEqual({ priority: 'critical' });
      });
      expect(new Set(delivered.map((commands) => commands[0].command_id)).size).toBe(3);
      expect(service.pollCommands('bot_d').commands).toEqual([]);
    });

    it('returns an empty target list when no device is registered', () => {
      expect(service.emergencyStopAll()).toEqual([]);
    });
  });

  describe('monitoring', () => {
    it('evicts silent devices on read but keeps their history and queue', () => {
      service.recordHeartbeat('bot_old', {});
      service.logActivity('bot_old', { action: 'tweet' });
      service.stopDevice('bot_old');
      clock.advance(11 * 60 * 1000);
      service.recordHeartbeat('bot_live', {});

      const status = service.getFleetStatus();

      expect(Object.keys(status.devices)).toEqual(['bot_live']);
      expect(status.total_devices).toBe(1);
      expect(status.online_devices).toBe(1);
      expect(status.recent_activities.bot_old).toHaveLength(1);
      expect(service.pollCommands('bot_old').commands).toHaveLength(1);
    });

    it('keeps a device that was seen exactly ten minutes ago', () => {
      service.recordHeartbeat('bot_alpha', {});
      clock.advance(10 * 60 * 1000);

      expect(service.getFleetStatus().total_devices).toBe(1);
    });

    it('aggregates action counts across the fleet', () => {
      service.recordHeartbeat('bot_a', { actions_today: { tweets: 5 }, uptime_hours: 2 });
      service.recordHeartbeat('bot_b', { actions_today: { replies: 2, retweets: 1 }, uptime_hours: 2 });
      service.recordHeartbeat('bot_c', { actions_today: {} });

      const { timestamp, analytics } = service.getAnalytics();

      expect(timestamp).toBe('2025-03-01T12:00:00.000Z');
      expect(analytics.action_breakdown).toEqual({
        total_actions: 8,
        tweets: 5,
        replies: 2,
        retweets: 1,
        tweet_percentage: 62.5,
        reply_percentage: 25,
        retweet_percentage: 12.5,
      });
      expect(analytics.fleet_overview).toEqual({
        total_devices: 3,
        online_devices: 3,
        offline_devices: 0,
        total_uptime_hours: 4,
        average_uptime_hours: 4 / 3,
      });
      expect(analytics.performance_metrics.action_efficiency).toBe(2);
      expect(analytics.top_performers.map((device) => device.id)).toEqual(['bot_a', 'bot_b', 'bot_c']);
    });

    it('reports zeros for an empty fleet', () => {
      const { analytics } = service.getAnalytics();

      expect(analytics.action_breakdown.tweet_percentage).toBe(0);
      expect(analytics.performance_metrics).toEqual({
        avg_actions_per_device: 0,
        uptime_percentage: 0,
        action_efficiency: 0,
        device_health_score: 0,
      });
      expect(analytics.fleet_overview.average_uptime_hours).toBe(0);
      expect(analytics.top_performers).toEqual([]);
    });

    it('leaves evicted devices out of analytics', () => {
      service.recordHeartbeat('bot_old', { actions_today: { tweets: 10 } });
      clock.advance(11 * 60 * 1000);

      expect(service.getAnalytics().analytics.action_breakdown.total_actions).toBe(0);
    });
  });
});

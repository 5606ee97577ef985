import { isNumber, isObject } from 'class-validator';
import { DeviceDetail, DeviceStatus, FleetAnalytics, TRACKED_ACTIONS, TrackedAction } from '../fleet/types';

export class AnalyticsUtils {
  /** Agent-reported numbers are not validated; anything non-numeric counts as 0. */
  static toNumber(value: unknown): number {
    return isNumber(value, { allowNaN: false, allowInfinity: false }) ? value : 0;
  }

  static countOf(actions: unknown, kind: string): number {
    return isObject<Record<string, unknown>>(actions) ? this.toNumber(actions[kind]) : 0;
  }

  static totalActions(actions: unknown): number {
    if (!isObject<Record<string, unknown>>(actions)) {
      return 0;
    }
    return Object.values(actions).reduce<number>((sum, count) => sum + this.toNumber(count), 0);
  }

  /** Division where a zero denominator yields 0. */
  static ratio(numerator: number, denominator: number): number {
    return denominator > 0 ? numerator / denominator : 0;
  }

  static percentage(part: number, whole: number): number {
    return whole > 0 ? (part / whole) * 100 : 0;
  }

  static displayName(deviceId: string): string {
    return deviceId.split('bot_').join('');
  }

  static buildFleetAnalytics(devices: Record<string, DeviceStatus>, topPerformerCount = 3): FleetAnalytics {
    const entries = Object.entries(devices);
    const totalDevices = entries.length;
    const onlineDevices = entries.filter(([, status]) => status.status === 'online').length;

    let totalActions = 0;
    const tracked: Record<TrackedAction, number> = { tweets: 0, replies: 0, retweets: 0 };
    let totalUptime = 0;

    const details: DeviceDetail[] = entries.map(([deviceId, status]) => {
      const deviceActions = this.totalActions(status.actions_today);
      const uptime = this.toNumber(status.uptime_hours);

      totalActions += deviceActions;
      for (const kind of TRACKED_ACTIONS) {
        tracked[kind] += this.countOf(status.actions_today, kind);
      }
      totalUptime += uptime;

      return {
        id: deviceId,
        name: this.displayName(deviceId),
        status: status.status,
        uptime_hours: uptime,
        actions_today: isObject<Record<string, unknown>>(status.actions_today) ? status.actions_today : {},
        total_actions: deviceActions,
        last_activity: status.last_activity,
        cpu_usage: this.toNumber(status.cpu_usage),
        memory_usage: this.toNumber(status.memory_usage),
      };
    });

    // Array.prototype.sort is stable, so ties keep registration order
    details.sort((a, b) => b.total_actions - a.total_actions);

    const healthScore = this.percentage(onlineDevices, totalDevices);

    return {
      fleet_overview: {
        total_devices: totalDevices,
        online_devices: onlineDevices,
        offline_devices: totalDevices - onlineDevices,
        total_uptime_hours: totalUptime,
        average_uptime_hours: this.ratio(totalUptime, totalDevices),
      },
      action_breakdown: {
        total_actions: totalActions,
        tweets: tracked.tweets,
        replies: tracked.replies,
        retweets: tracked.retweets,
        tweet_percentage: this.percentage(tracked.tweets, totalActions),
        reply_percentage: this.percentage(tracked.replies, totalActions),
        retweet_percentage: this.percentage(tracked.retweets, totalActions),
      },
      device_details: details,
      performance_metrics: {
        avg_actions_per_device: this.ratio(totalActions, totalDevices),
        uptime_percentage: healthScore,
        action_efficiency: this.ratio(totalActions, totalUptime),
        device_health_score: healthScore,
      },
      top_performers: details.slice(0, topPerformerCount),
    };
  }
}

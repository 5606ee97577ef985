export type DeviceLifecycle = 'online';

export interface DeviceStatus {
  status: DeviceLifecycle;
  last_seen: string;
  // agent-reported fields below are stored exactly as sent, including null
  uptime_hours: unknown;
  cpu_usage: unknown;
  memory_usage: unknown;
  actions_today: unknown;
  next_scheduled: unknown;
  content_version: unknown;
  twitter_logged_in: unknown;
  last_activity: string;
}

/** Fields a device may send with a heartbeat. Nothing here is enforced. */
export interface HeartbeatReport {
  uptime_hours?: unknown;
  cpu_usage?: unknown;
  memory_usage?: unknown;
  actions_today?: unknown;
  next_scheduled?: unknown;
  content_version?: unknown;
  twitter_logged_in?: unknown;
}

export interface FleetSnapshot {
  devices: Record<string, DeviceStatus>;
  totalDevices: number;
  onlineDevices: number;
}

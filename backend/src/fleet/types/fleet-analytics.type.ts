export interface DeviceDetail {
  id: string;
  name: string;
  status: string;
  uptime_hours: number;
  actions_today: Record<string, unknown>;
  total_actions: number;
  last_activity: string;
  cpu_usage: number;
  memory_usage: number;
}

export interface FleetAnalytics {
  fleet_overview: {
    total_devices: number;
    online_devices: number;
    offline_devices: number;
    total_uptime_hours: number;
    average_uptime_hours: number;
  };
  action_breakdown: {
    total_actions: number;
    tweets: number;
    replies: number;
    retweets: number;
    tweet_percentage: number;
    reply_percentage: number;
    retweet_percentage: number;
  };
  device_details: DeviceDetail[];
  performance_metrics: {
    avg_actions_per_device: number;
    uptime_percentage: number;
    action_efficiency: number;
    device_health_score: number;
  };
  top_performers: DeviceDetail[];
}

import { ApiProperty } from '@nestjs/swagger';
import { HeartbeatReport } from '../types';

export class HeartbeatDto implements HeartbeatReport {
  @ApiProperty({ description: 'Hours since the agent started', required: false, default: 0 })
  uptime_hours?: number;

  @ApiProperty({ description: 'CPU usage percentage', required: false, default: 0 })
  cpu_usage?: number;

  @ApiProperty({ description: 'Memory usage percentage', required: false, default: 0 })
  memory_usage?: number;

  @ApiProperty({
    description: 'Action counts for the current day, keyed by action kind',
    required: false,
    example: { tweets: 5, replies: 2, retweets: 1 },
  })
  actions_today?: Record<string, unknown>;

  @ApiProperty({ description: 'Next scheduled action, as reported by the agent', required: false })
  next_scheduled?: unknown;

  @ApiProperty({ description: 'Content pack version', required: false, default: 'unknown' })
  content_version?: string;

  @ApiProperty({ description: 'Whether the agent holds a logged-in session', required: false, default: false })
  twitter_logged_in?: boolean;
}

export const NEVER = 'Never';

export const COMMAND_ACTIONS = {
  STOP: 'stop_bot',
  RESTART: 'restart_bot',
  EMERGENCY_STOP: 'emergency_stop',
} as const;

export const TRACKED_ACTIONS = ['tweets', 'replies', 'retweets'] as const;
export type TrackedAction = (typeof TRACKED_ACTIONS)[number];

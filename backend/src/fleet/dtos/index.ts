export * from './activity.dto';
export * from './heartbeat.dto';

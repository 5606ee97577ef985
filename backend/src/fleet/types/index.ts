export * from './activity-entry.type';
export * from './constants.type';
export * from './device-command.type';
export * from './device-status.type';
export * from './fleet-analytics.type';

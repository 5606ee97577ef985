const configuration = () => ({
  app: {
    name: process.env.APP_NAME || 'Fleet Command API',
    version: process.env.APP_VERSION || '1.0.0',
  },
  port: parseInt(process.env.PORT || '5000', 10),
  auth: {
    apiKey: process.env.API_KEY,
    // joi reads booleans case-insensitively
    enforce: process.env.AUTH_ENFORCE?.toLowerCase() === 'true',
  },
  fleet: {
    staleThresholdMs: parseInt(process.env.FLEET_STALE_THRESHOLD_MS || '600000', 10),
    activityLogLimit: parseInt(process.env.FLEET_ACTIVITY_LOG_LIMIT || '50', 10),
    contentPreviewLength: parseInt(process.env.FLEET_CONTENT_PREVIEW_LENGTH || '100', 10),
    commandQueueWarnDepth: parseInt(process.env.FLEET_COMMAND_QUEUE_WARN_DEPTH || '100', 10),
    sweepIntervalMs: parseInt(process.env.FLEET_SWEEP_INTERVAL_MS || '0', 10),
    topPerformerCount: 3,
  },
});

export type AppConfig = ReturnType<typeof configuration>;
export default configuration;

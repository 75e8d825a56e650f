import pino from 'pino';

// Bot tokens travel through handles and admin requests; never print them
const REDACTED_PATHS = ['credential', '*.credential', 'token', '*.token', 'req.headers.authorization'];

const logger = pino({
  level: process.env.PINO_LOG_LEVEL || 'info',
  base: { service: 'tenant-relay' },
  redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
  timestamp: () => `,"timestamp":"${new Date(Date.now()).toISOString()}"`,
  formatters: {
    level: (label) => ({ level: label.toUpperCase() }),
  },
});

export const componentLogger = (component: string) => logger.child({ component });

export default logger;

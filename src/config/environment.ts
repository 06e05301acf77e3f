import { registerAs } from '@nestjs/config'

/**
 * Environment Configuration
 *
 * Centralizes all environment variables for the order service.
 * Values are read once at startup, after `validate` has checked them.
 */
export default registerAs('config', () => ({
  // Service Information
  // These help identify the service in logs, metrics and response headers
  service: {
    name: process.env.SERVICE_NAME || 'order-service',
    version: process.env.npm_package_version || '0.0.0',
  },

  app: {
    env: process.env.NODE_ENV || 'development',
    port: Number.parseInt(process.env.PORT || '8082', 10),
    // Empty by default so the routes match the published contract (/orders, /users/get)
    apiPrefix: process.env.API_PREFIX || '',
  },

  cors: {
    origin: process.env.CORS_ORIGIN || '*',
  },

  // Database Configuration
  // When disabled the repositories keep their data in memory
  database: {
    url: process.env.DATABASE_URL,
    enabled: process.env.DATABASE_ENABLED === 'true',
    migrate: process.env.DATABASE_MIGRATE === 'true',
    poolMax: Number.parseInt(process.env.DATABASE_POOL_MAX || '10', 10),
  },

  // Collaborators reached over HTTP
  services: {
    userService: {
      url: process.env.USER_SERVICE_URL || 'http://localhost:8081',
    },
    paymentService: {
      url: process.env.PAYMENT_SERVICE_URL || 'http://localhost:8083',
    },
  },

  http: {
    // Upper bound for every outbound call; a timeout counts as a failed call
    timeoutMs: Number.parseInt(process.env.HTTP_TIMEOUT_MS || '5000', 10),
  },

  metrics: {
    enabled: process.env.METRICS_ENABLED !== 'false', // Enabled by default
  },

  logging: {
    level: process.env.LOG_LEVEL || 'info',
    format:
      process.env.LOG_FORMAT ||
      (process.env.NODE_ENV === 'production' ? 'json' : 'pretty'),
    enableConsole: process.env.ENABLE_CONSOLE_LOGS !== 'false',
  },

  // Feature Flags
  features: {
    // Hosts the user-service endpoints (POST /users, GET /users/get) in this process
    enableUserDirectory: process.env.ENABLE_USER_DIRECTORY !== 'false',
  },
}))

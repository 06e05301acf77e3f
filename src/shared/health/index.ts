export { DatabaseHealthIndicator } from './database.health'
export { HealthModule } from './health.module'

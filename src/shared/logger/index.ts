export { LoggerModule } from './logger.module'
export { AppLogger } from './logger.service'

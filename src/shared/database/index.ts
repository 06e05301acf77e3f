export { DatabaseModule } from './database.module'
export { DatabaseService } from './database.service'

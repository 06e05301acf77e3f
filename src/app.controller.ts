import { Controller, Get } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'

/**
 * App Controller
 *
 * Root controller for basic service information.
 */
@Controller()
export class AppController {
  constructor(private readonly configService: ConfigService) {}

  /**
   * Service information endpoint
   *
   * Identifies the running service and the collaborators it calls.
   */
  @Get()
  getInfo() {
    return {
      service: this.configService.get<string>('config.service.name'),
      version: this.configService.get<string>('config.service.version'),
      environment: this.configService.get<string>('config.app.env'),
      dependencies: {
        userService: this.configService.get<string>('config.services.userService.url'),
        paymentService: this.configService.get<string>('config.services.paymentService.url'),
      },
      userDirectory: this.configService.get<boolean>('config.features.enableUserDirectory') ?? true,
      timestamp: new Date().toISOString(),
    }
  }
}

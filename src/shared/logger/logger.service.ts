import { Injectable, LoggerService } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { createLogger, format, Logger as WinstonLogger, transports } from 'winston'

/**
 * Application Logger
 *
 * Nest LoggerService backed by winston. Installed with `app.useLogger`, so
 * every `new Logger(Context)` in the feature modules ends up here.
 *
 * - json format: one JSON object per line, for log collectors
 * - pretty format: colorized single lines for local development
 */
@Injectable()
export class AppLogger implements LoggerService {
  private readonly logger: WinstonLogger
  private context?: string

  constructor(configService: ConfigService) {
    const level = configService.get<string>('config.logging.level') ?? 'info'
    const logFormat = configService.get<string>('config.logging.format') ?? 'json'
    const enableConsole = configService.get<boolean>('config.logging.enableConsole') ?? true
    const serviceName = configService.get<string>('config.service.name') ?? 'order-service'

    this.logger = createLogger({
      level,
      defaultMeta: { service: serviceName },
      format: format.combine(
        format.timestamp(),
        format.errors({ stack: true }),
        logFormat === 'pretty' ? AppLogger.prettyFormat() : format.json()
      ),
      transports: [new transports.Console()],
      silent: !enableConsole,
    })
  }

  private static prettyFormat() {
    return format.combine(
      format.colorize(),
      format.printf(({ timestamp, level, message, context, stack }) => {
        const scope = typeof context === 'string' ? ` [${context}]` : ''
        const trace = typeof stack === 'string' ? `\n${stack}` : ''
        return `${String(timestamp)} ${level}${scope} ${String(message)}${trace}`
      })
    )
  }

  setContext(context: string): void {
    this.context = context
  }

  log(message: unknown, ...optionalParams: unknown[]): void {
    this.write('info', message, optionalParams)
  }

  /**
   * Nest calls this as `error(message, stack?, context?)`
   */
  error(message: unknown, ...optionalParams: unknown[]): void {
    const [context, rest] = this.splitContext(optionalParams)
    const [stack, extra] =
      typeof rest[0] === 'string' && rest[0].includes('\n') ? [rest[0], rest.slice(1)] : [undefined, rest]

    this.logger.log({
      level: 'error',
      message: this.stringify(message),
      context,
      stack: stack ?? (message instanceof Error ? message.stack : undefined),
      ...(extra.length > 0 ? { details: extra.map((item) => this.stringify(item)) } : {}),
    })
  }

  warn(message: unknown, ...optionalParams: unknown[]): void {
    this.write('warn', message, optionalParams)
  }

  debug(message: unknown, ...optionalParams: unknown[]): void {
    this.write('debug', message, optionalParams)
  }

  verbose(message: unknown, ...optionalParams: unknown[]): void {
    this.write('verbose', message, optionalParams)
  }

  fatal(message: unknown, ...optionalParams: unknown[]): void {
    this.write('error', message, optionalParams)
  }

  private write(level: string, message: unknown, optionalParams: unknown[]): void {
    const [context, rest] = this.splitContext(optionalParams)
    this.logger.log({
      level,
      message: this.stringify(message),
      context,
      ...(rest.length > 0 ? { details: rest.map((item) => this.stringify(item)) } : {}),
    })
  }

  /**
   * Nest appends the logger context as the last string argument
   */
  private splitContext(params: unknown[]): [string | undefined, unknown[]] {
    const last = params.at(-1)
    if (params.length > 0 && typeof last === 'string') {
      return [last, params.slice(0, -1)]
    }
    return [this.context, params]
  }

  private stringify(value: unknown): string {
    if (typeof value === 'string') {
      return value
    }
    if (value instanceof Error) {
      return value.message
    }
    return JSON.stringify(value)
  }
}

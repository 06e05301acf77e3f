import { BadRequestException, ValidationError, ValidationPipe } from '@nestjs/common'

/**
 * Global Validation Pipe
 *
 * Validates request bodies and queries against their DTO classes.
 * Unknown properties are stripped, primitives are converted to the
 * declared types, and failures become a 400 with a flat `errors` list:
 *
 * { "message": "Validation failed", "errors": ["quantity must be a positive number"] }
 */
export class GlobalValidationPipe extends ValidationPipe {
  constructor() {
    super({
      whitelist: true,
      transform: true,
      exceptionFactory: (errors: ValidationError[]) =>
        new BadRequestException({
          message: 'Validation failed',
          errors: flattenValidationErrors(errors),
        }),
    })
  }
}

/**
 * Collect constraint messages from nested validation errors
 */
export function flattenValidationErrors(errors: ValidationError[], parentPath = ''): string[] {
  return errors.flatMap((error) => {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property
    const own = Object.values(error.constraints ?? {})
    const nested = flattenValidationErrors(error.children ?? [], path)
    return [...own, ...nested]
  })
}

import { Expose } from 'class-transformer'
import { IsInt, IsNotEmpty, IsNumber, IsPositive, IsString, Max, MaxLength, Min } from 'class-validator'

/** Largest value of a PostgreSQL INTEGER column */
export const MAX_INTEGER = 2147483647

/** Largest value of the NUMERIC(12, 2) amount column */
export const MAX_AMOUNT = 9999999999.99

/**
 * Create Order DTO
 *
 * Wire format is snake_case (`user_id`); `@Expose` maps it onto the
 * camelCase property when the validation pipe builds the instance.
 * Client-supplied `id`, `status` or `created_at` are stripped.
 * Bounds match the orders table so every accepted order can be stored as sent.
 */
export class CreateOrderDto {
  @Expose({ name: 'user_id' })
  @IsInt({ message: 'user_id must be an integer' })
  @IsPositive({ message: 'user_id must be a positive number' })
  @Max(MAX_INTEGER, { message: `user_id must not be greater than ${MAX_INTEGER}` })
  userId!: number

  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  product!: string

  @IsInt()
  @IsPositive()
  @Max(MAX_INTEGER)
  quantity!: number

  @IsNumber({ allowNaN: false, allowInfinity: false, maxDecimalPlaces: 2 })
  @Min(0)
  @Max(MAX_AMOUNT)
  amount!: number
}

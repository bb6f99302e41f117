import { IsNotEmpty, IsString, ValidateBy, ValidationOptions, buildMessage } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export const DEPOSIT_NOTIFICATION_KIND = 'new_deposit';

/**
 * Amount as sent by the payments API: a decimal string or a finite number
 */
export function IsAmount(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: 'isAmount',
      validator: {
        validate: (value: unknown): boolean =>
          (typeof value === 'string' && value.trim().length > 0) ||
          (typeof value === 'number' && Number.isFinite(value)),
        defaultMessage: buildMessage(
          (eachPrefix) => `${eachPrefix}$property must be a non-empty string or a finite number`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}

/**
 * Deposit notification pushed by the payments API
 */
export class DepositNotificationDto {
  @ApiProperty({
    description: 'Event kind; only new_deposit is relayed',
    example: DEPOSIT_NOTIFICATION_KIND,
  })
  @IsString()
  message!: string;

  @ApiProperty({
    description: 'Deposit address of the payment',
    example: 'TKTgEtjonYPdCWDs7bUb9dUUwYikceDabx',
  })
  @IsString()
  @IsNotEmpty()
  address!: string;

  @ApiProperty({
    description: 'Deposited amount in USDT',
    oneOf: [{ type: 'string' }, { type: 'number' }],
    example: '25.5',
  })
  @IsAmount()
  amount!: string | number;

  @ApiProperty({
    description: 'Payment status after the deposit',
    example: 'paid',
  })
  @IsString()
  @IsNotEmpty()
  new_status!: string;

  @ApiProperty({
    description: 'Merchant API credential the payment belongs to',
    example: 'merchant-token',
  })
  @IsString()
  @IsNotEmpty()
  merchant_api_token!: string;
}

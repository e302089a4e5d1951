/**
 * Polka webhook payload
 */

import { IsObject, IsString, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';

export const USER_UPGRADED_EVENT = 'user.upgraded';

export class PolkaEventDataDto {
  @IsString()
  user_id!: string;
}

export class PolkaEventDto {
  @IsString()
  event!: string;

  @IsObject()
  @ValidateNested()
  @Type(() => PolkaEventDataDto)
  data!: PolkaEventDataDto;
}

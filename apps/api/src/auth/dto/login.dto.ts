/**
 * Login DTO
 * Any string is accepted as the email; an unknown one fails like a wrong password
 */

import { IsNotEmpty, IsString } from 'class-validator';

export class LoginDto {
  @IsString()
  @IsNotEmpty()
  email!: string;

  @IsString()
  @IsNotEmpty()
  password!: string;
}

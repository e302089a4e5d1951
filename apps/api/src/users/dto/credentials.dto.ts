/**
 * Credentials DTO
 * Request body for registration, credential update and login
 */

import { IsEmail, IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class CredentialsDto {
  @IsEmail()
  email!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  password!: string;
}

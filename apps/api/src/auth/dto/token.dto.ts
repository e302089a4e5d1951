export interface TokenResponseDto {
  token: string;
}

import { IsString, MaxLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class PasswordStrengthRequestDto {
  @ApiProperty({ description: 'Candidate master password. It is scored and never stored.', maxLength: 1024 })
  @IsString()
  @MaxLength(1024)
  password!: string;
}

export class PasswordStrengthResponseDto {
  @ApiProperty({ description: 'Score between 0 and 100', example: 75 })
  score!: number;

  @ApiProperty({ enum: ['Very Weak', 'Weak', 'Fair', 'Good', 'Strong'], example: 'Good' })
  level!: string;

  @ApiProperty({ type: [String], example: ['Avoid sequential characters'] })
  feedback!: string[];

  @ApiProperty({ description: 'Colour hint for a strength meter', example: '#99cc00' })
  color!: string;

  @ApiProperty({ description: 'Whether the password passes the master-password gate' })
  acceptable!: boolean;
}

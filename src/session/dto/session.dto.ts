import { IsOptional, IsString, MaxLength, MinLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { VaultKeySource } from '../../config/config.constants';
import { SessionState } from '../interfaces';

const MAX_PASSWORD_LENGTH = 1024;

export class SetupSessionDto {
  @ApiProperty({ description: 'New master password', maxLength: MAX_PASSWORD_LENGTH })
  @IsString()
  @MinLength(1)
  @MaxLength(MAX_PASSWORD_LENGTH)
  password!: string;

  @ApiPropertyOptional({ description: 'Repeat of the password; must match when given' })
  @IsOptional()
  @IsString()
  @MaxLength(MAX_PASSWORD_LENGTH)
  confirmation?: string;
}

export class UnlockSessionDto {
  @ApiProperty({ description: 'Master password', maxLength: MAX_PASSWORD_LENGTH })
  @IsString()
  @MinLength(1)
  @MaxLength(MAX_PASSWORD_LENGTH)
  password!: string;
}

export class ChangePasswordDto {
  @ApiProperty({ description: 'Current master password' })
  @IsString()
  @MinLength(1)
  @MaxLength(MAX_PASSWORD_LENGTH)
  oldPassword!: string;

  @ApiProperty({ description: 'New master password' })
  @IsString()
  @MinLength(1)
  @MaxLength(MAX_PASSWORD_LENGTH)
  newPassword!: string;

  @ApiPropertyOptional({ description: 'Repeat of the new password; must match when given' })
  @IsOptional()
  @IsString()
  @MaxLength(MAX_PASSWORD_LENGTH)
  confirmation?: string;
}

export class SessionStatusDto {
  @ApiProperty({ enum: SessionState, example: SessionState.UNLOCKED })
  state!: SessionState;

  @ApiProperty({ example: 3 })
  credentialCount!: number;

  @ApiProperty({ type: [String], description: 'Credential files that did not load at the last unlock' })
  failedFiles!: string[];

  @ApiProperty({ enum: VaultKeySource })
  keySource!: VaultKeySource;

  @ApiProperty({ example: 180 })
  idleTimeoutSecs!: number;
}

export class LockResponseDto {
  @ApiProperty({ description: 'False when the session was not unlocked' })
  locked!: boolean;
}

export class ChangePasswordResponseDto {
  @ApiProperty({ type: [String], description: 'Credential files re-encrypted under the new password' })
  succeeded!: string[];

  @ApiProperty({ type: [String] })
  failed!: string[];

  @ApiProperty()
  committed!: boolean;
}

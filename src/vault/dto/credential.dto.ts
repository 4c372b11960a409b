import { Equals, IsBase64, IsBoolean, IsIn, IsInt, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { HASH_ALGORITHMS, HashAlgorithm } from '../../otp/interfaces/credential.interface';

const MAX_URI_LENGTH = 4096;
/** Uploaded QR images, base64 encoded */
const MAX_UPLOAD_LENGTH = 4 * 1024 * 1024;

export class ImportUriDto {
  @ApiProperty({
    description: 'otpauth URI',
    example: 'otpauth://totp/Acme:alice%40example.com?secret=JBSWY3DPEHPK3PXP&issuer=Acme',
    maxLength: MAX_URI_LENGTH,
  })
  @IsString()
  @MaxLength(MAX_URI_LENGTH)
  uri!: string;

  @ApiPropertyOptional({ description: 'Replace a credential with the same name', default: false })
  @IsOptional()
  @IsBoolean()
  overwrite?: boolean;
}

export class ImportQrDto {
  @ApiProperty({ description: 'Base64 of the uploaded file: a QR image or an encrypted QR export' })
  @IsString()
  @IsBase64()
  @MaxLength(MAX_UPLOAD_LENGTH)
  data!: string;

  @ApiPropertyOptional({ default: false })
  @IsOptional()
  @IsBoolean()
  overwrite?: boolean;
}

export class ComputeCodeDto {
  @ApiProperty({ description: 'Base32 secret', example: 'JBSWY3DPEHPK3PXP' })
  @IsString()
  @MaxLength(1024)
  secret!: string;

  @ApiPropertyOptional({ enum: [...HASH_ALGORITHMS], default: 'SHA1' })
  @IsOptional()
  @IsIn(HASH_ALGORITHMS)
  algorithm?: HashAlgorithm;

  @ApiPropertyOptional({ minimum: 4, maximum: 10, default: 6 })
  @IsOptional()
  @IsInt()
  @Min(4)
  @Max(10)
  digits?: number;

  @ApiPropertyOptional({ minimum: 1, default: 30 })
  @IsOptional()
  @IsInt()
  @Min(1)
  period?: number;
}

export class ResetVaultDto {
  @ApiProperty({ description: 'Must be true; the whole vault is deleted' })
  @IsBoolean()
  @Equals(true)
  confirm!: boolean;
}

export class CredentialSummaryDto {
  @ApiProperty({ description: 'File-safe name the credential is stored under', example: 'alice_example.com' })
  name!: string;

  @ApiProperty({ enum: ['totp', 'hotp'] })
  kind!: 'totp' | 'hotp';

  @ApiProperty({ example: 'alice@example.com' })
  label!: string;

  @ApiProperty({ example: 'Acme' })
  issuer!: string;

  @ApiProperty({ enum: [...HASH_ALGORITHMS] })
  algorithm!: HashAlgorithm;

  @ApiProperty({ example: 6 })
  digits!: number;

  @ApiPropertyOptional({ example: 30 })
  period?: number;

  @ApiPropertyOptional({ example: 0 })
  counter?: number;

  @ApiProperty({ description: 'Current code, or "code unavailable"', example: '492039' })
  code!: string;

  @ApiPropertyOptional({ description: 'Seconds left in the current TOTP window', example: 17 })
  remainingSeconds?: number;
}

export class CodeSnapshotDto {
  @ApiProperty()
  generatedAt!: string;

  @ApiProperty({ type: [CredentialSummaryDto] })
  entries!: CredentialSummaryDto[];
}

export class UriResponseDto {
  @ApiProperty()
  uri!: string;
}

export class QrExportResponseDto {
  @ApiProperty()
  name!: string;

  @ApiProperty({ description: 'Base64 text of the encrypted PNG, ready to be written to a file' })
  data!: string;
}

export class GeneratedSecretResponseDto {
  @ApiProperty({ description: 'Random 160-bit Base32 secret' })
  secret!: string;
}

export class ComputedCodeResponseDto {
  @ApiProperty()
  code!: string;

  @ApiPropertyOptional()
  remainingSeconds?: number;
}

export class ResetVaultResponseDto {
  @ApiProperty({ description: 'Number of credential files removed' })
  removed!: number;
}

export class ImportScanStatusDto {
  @ApiProperty({ description: 'Whether a clipboard source is configured' })
  enabled!: boolean;

  @ApiPropertyOptional()
  lastCheckedAt?: string;

  @ApiPropertyOptional({ description: 'Name of the last credential imported from the clipboard' })
  lastImported?: string;

  @ApiPropertyOptional()
  lastError?: string;
}

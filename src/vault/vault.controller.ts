import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import {
  ApiCreatedResponse,
  ApiNoContentResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiQuery,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { UnlockedGuard } from '../session/unlocked.guard';
import { VaultService } from './vault.service';
import { VaultSchedulerService } from './vault-scheduler.service';
import {
  CodeSnapshotDto,
  ComputeCodeDto,
  ComputedCodeResponseDto,
  CredentialSummaryDto,
  GeneratedSecretResponseDto,
  ImportQrDto,
  ImportScanStatusDto,
  ImportUriDto,
  QrExportResponseDto,
  ResetVaultDto,
  ResetVaultResponseDto,
  UriResponseDto,
} from './dto/credential.dto';

@ApiTags('Vault')
@Controller('api')
export class VaultController {
  constructor(
    private readonly vaultService: VaultService,
    private readonly vaultScheduler: VaultSchedulerService,
  ) {}

  /**
   * GET /api/credentials
   */
  @Get('credentials')
  @UseGuards(UnlockedGuard)
  @ApiOperation({ summary: 'List credentials with their current codes' })
  @ApiOkResponse({ type: [CredentialSummaryDto] })
  @ApiResponse({ status: 401, description: 'Vault is locked.' })
  listCredentials(): CredentialSummaryDto[] {
    return this.vaultService.listCredentials();
  }

  /**
   * POST /api/credentials
   */
  @Post('credentials')
  @UseGuards(UnlockedGuard)
  @ApiOperation({ summary: 'Import an otpauth URI' })
  @ApiCreatedResponse({ type: CredentialSummaryDto })
  @ApiResponse({ status: 400, description: 'The URI is invalid.' })
  @ApiResponse({ status: 409, description: 'A credential with the same name exists and overwrite is not set.' })
  async importUri(@Body() dto: ImportUriDto): Promise<CredentialSummaryDto> {
    return this.vaultService.importUri(dto.uri, dto.overwrite ?? false);
  }

  /**
   * POST /api/credentials/qr
   */
  @Post('credentials/qr')
  @UseGuards(UnlockedGuard)
  @ApiOperation({
    summary: 'Import from a QR image',
    description: 'Accepts a plain QR image or an encrypted export produced by this vault.',
  })
  @ApiCreatedResponse({ type: CredentialSummaryDto })
  @ApiResponse({ status: 501, description: 'No QR codec is configured.' })
  async importQr(@Body() dto: ImportQrDto): Promise<CredentialSummaryDto> {
    return this.vaultService.importQr(Buffer.from(dto.data, 'base64'), dto.overwrite ?? false);
  }

  /**
   * GET /api/credentials/:name
   */
  @Get('credentials/:name')
  @UseGuards(UnlockedGuard)
  @ApiOperation({ summary: 'Get one credential and its current code' })
  @ApiParam({ name: 'name', description: 'Stored credential name' })
  @ApiOkResponse({ type: CredentialSummaryDto })
  @ApiResponse({ status: 404, description: 'No such credential.' })
  getCredential(@Param('name') name: string): CredentialSummaryDto {
    return this.vaultService.getCredential(name);
  }

  /**
   * GET /api/credentials/:name/uri
   */
  @Get('credentials/:name/uri')
  @UseGuards(UnlockedGuard)
  @ApiOperation({ summary: 'Get the otpauth URI of a credential' })
  @ApiParam({ name: 'name', description: 'Stored credential name' })
  @ApiOkResponse({ type: UriResponseDto })
  getUri(@Param('name') name: string): UriResponseDto {
    return { uri: this.vaultService.getUri(name) };
  }

  /**
   * DELETE /api/credentials/:name
   */
  @Delete('credentials/:name')
  @UseGuards(UnlockedGuard)
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a credential' })
  @ApiParam({ name: 'name', description: 'Stored credential name' })
  @ApiNoContentResponse({ description: 'Credential deleted.' })
  @ApiResponse({ status: 404, description: 'No such credential.' })
  async deleteCredential(@Param('name') name: string): Promise<void> {
    await this.vaultService.deleteCredential(name);
  }

  /**
   * POST /api/credentials/:name/qr
   */
  @Post('credentials/:name/qr')
  @UseGuards(UnlockedGuard)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Export an encrypted QR image of a credential' })
  @ApiParam({ name: 'name', description: 'Stored credential name' })
  @ApiOkResponse({ type: QrExportResponseDto })
  @ApiResponse({ status: 501, description: 'No QR codec is configured.' })
  async exportQr(@Param('name') name: string): Promise<QrExportResponseDto> {
    return this.vaultService.exportQr(name);
  }

  /**
   * GET /api/codes
   * Latest snapshot from the refresh task.
   */
  @Get('codes')
  @UseGuards(UnlockedGuard)
  @ApiOperation({ summary: 'Get the latest code snapshot' })
  @ApiOkResponse({ type: CodeSnapshotDto })
  getCodes(): CodeSnapshotDto {
    return this.vaultService.getSnapshot();
  }

  /**
   * POST /api/codes/compute
   */
  @Post('codes/compute')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Preview the time-based code of a bare secret' })
  @ApiOkResponse({ type: ComputedCodeResponseDto })
  @ApiResponse({ status: 400, description: 'The secret is not valid Base32.' })
  computeCode(@Body() dto: ComputeCodeDto): ComputedCodeResponseDto {
    return this.vaultService.computeCode(dto.secret, {
      algorithm: dto.algorithm,
      digits: dto.digits,
      period: dto.period,
    });
  }

  /**
   * GET /api/secrets/generate
   */
  @Get('secrets/generate')
  @ApiOperation({ summary: 'Generate a random Base32 secret' })
  @ApiQuery({ name: 'bytes', required: false, description: 'Secret length in bytes (default 20)' })
  @ApiOkResponse({ type: GeneratedSecretResponseDto })
  generateSecret(
    @Query('bytes', new ParseIntPipe({ optional: true })) bytes?: number,
  ): GeneratedSecretResponseDto {
    return { secret: this.vaultService.generateSecret(bytes) };
  }

  /**
   * GET /api/import/status
   */
  @Get('import/status')
  @ApiOperation({ summary: 'Get the clipboard import scan status' })
  @ApiOkResponse({ type: ImportScanStatusDto })
  getImportStatus(): ImportScanStatusDto {
    return this.vaultScheduler.getImportStatus();
  }

  /**
   * POST /api/vault/reset
   * Allowed while locked, for a forgotten master password.
   */
  @Post('vault/reset')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Delete every credential and the master password' })
  @ApiOkResponse({ type: ResetVaultResponseDto })
  async reset(@Body() _dto: ResetVaultDto): Promise<ResetVaultResponseDto> {
    return { removed: await this.vaultService.reset() };
  }
}

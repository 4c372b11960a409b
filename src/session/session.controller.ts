import { Body, Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Throttle } from '@nestjs/throttler';
import { SessionService } from './session.service';
import {
  ChangePasswordDto,
  ChangePasswordResponseDto,
  LockResponseDto,
  SessionStatusDto,
  SetupSessionDto,
  UnlockSessionDto,
} from './dto/session.dto';

/** Password attempts per minute and client */
const AUTH_THROTTLE = { default: { limit: 10, ttl: 60_000 } };

@ApiTags('Session')
@Controller('api/session')
export class SessionController {
  constructor(private readonly sessionService: SessionService) {}

  /**
   * GET /api/session
   */
  @Get()
  @ApiOperation({ summary: 'Get session state' })
  @ApiOkResponse({ type: SessionStatusDto })
  getStatus(): SessionStatusDto {
    return this.sessionService.getStatus();
  }

  /**
   * POST /api/session/setup
   * First run only.
   */
  @Post('setup')
  @Throttle(AUTH_THROTTLE)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Set the master password and open the vault' })
  @ApiOkResponse({ type: SessionStatusDto })
  @ApiResponse({ status: 400, description: 'Password too weak or confirmation does not match.' })
  @ApiResponse({ status: 409, description: 'A master password is already set.' })
  async setup(@Body() dto: SetupSessionDto): Promise<SessionStatusDto> {
    return this.sessionService.setup(dto.password, dto.confirmation);
  }

  /**
   * POST /api/session/unlock
   */
  @Post('unlock')
  @Throttle(AUTH_THROTTLE)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Unlock or re-authenticate',
    description: 'A wrong password ends the session unless termination on authentication failure is disabled.',
  })
  @ApiOkResponse({ type: SessionStatusDto })
  @ApiResponse({ status: 401, description: 'Wrong master password.' })
  async unlock(@Body() dto: UnlockSessionDto): Promise<SessionStatusDto> {
    return this.sessionService.unlock(dto.password);
  }

  /**
   * POST /api/session/lock
   */
  @Post('lock')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Lock the vault now' })
  @ApiOkResponse({ type: LockResponseDto })
  lock(): LockResponseDto {
    return { locked: this.sessionService.lock('manual') };
  }

  /**
   * POST /api/session/password
   */
  @Post('password')
  @Throttle(AUTH_THROTTLE)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Change the master password and re-encrypt the vault' })
  @ApiOkResponse({ type: ChangePasswordResponseDto })
  @ApiResponse({ status: 401, description: 'Session locked or old password wrong.' })
  @ApiResponse({ status: 409, description: 'Some credential files did not decrypt; nothing was changed.' })
  async changePassword(@Body() dto: ChangePasswordDto): Promise<ChangePasswordResponseDto> {
    return this.sessionService.changePassword(dto.oldPassword, dto.newPassword, dto.confirmation);
  }
}

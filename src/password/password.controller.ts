import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import { PasswordStrengthService } from './password-strength.service';
import { PasswordStrengthRequestDto, PasswordStrengthResponseDto } from './dto/password-strength.dto';

@ApiTags('Password')
@Controller('api/password')
export class PasswordController {
  constructor(private readonly passwordStrengthService: PasswordStrengthService) {}

  /**
   * POST /api/password/strength
   * Available in every session state, so the setup screen can show a meter.
   */
  @Post('strength')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Score a candidate master password' })
  @ApiOkResponse({ type: PasswordStrengthResponseDto })
  scorePassword(@Body() dto: PasswordStrengthRequestDto): PasswordStrengthResponseDto {
    return {
      ...this.passwordStrengthService.score(dto.password),
      acceptable: this.passwordStrengthService.isAcceptable(dto.password),
    };
  }
}

import { Module } from '@nestjs/common';
import { PasswordController } from './password.controller';
import { PasswordStrengthService } from './password-strength.service';

@Module({
  controllers: [PasswordController],
  providers: [PasswordStrengthService],
  exports: [PasswordStrengthService],
})
export class PasswordModule {}

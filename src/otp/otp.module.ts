import { Module } from '@nestjs/common';
import { CodeGeneratorService } from './code-generator.service';

/**
 * Code generation for parsed credentials. URI parsing and building are plain functions
 * in `uri-codec.ts` and need no provider.
 */
@Module({
  providers: [CodeGeneratorService],
  exports: [CodeGeneratorService],
})
export class OtpModule {}

import { ApiProperty } from '@nestjs/swagger';

/**
 * Response for GET /health endpoint
 * Contains health status of the application and the vault
 */
export class HealthResponseDto {
  @ApiProperty({
    description: 'Overall health status',
    example: 'ok',
    enum: ['ok', 'error'],
  })
  status!: string;

  @ApiProperty({
    description: 'Detailed information about each health indicator when healthy',
    example: {
      server: { status: 'up' },
      vault: { status: 'up', open: true, writable: true, initialized: true, session: 'locked' },
    },
    required: false,
  })
  info?: Record<string, unknown>;

  @ApiProperty({
    description: 'Error information if health check failed',
    example: {
      vault: { status: 'down', open: true, writable: false, initialized: true, session: 'locked' },
    },
    required: false,
  })
  error?: Record<string, unknown>;

  @ApiProperty({
    description: 'Detailed health check results for all indicators',
    example: {
      server: { status: 'up' },
      vault: { status: 'up', open: true, writable: true, initialized: false, session: 'uninitialized' },
    },
  })
  details!: Record<string, unknown>;
}

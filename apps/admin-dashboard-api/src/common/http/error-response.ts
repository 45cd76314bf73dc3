import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { ERROR_KINDS, ErrorKind } from './error-kinds';

/** Body of every error response. */
export interface ErrorResponseBody {
  statusCode: number;
  kind: ErrorKind;
  message: string;
  /** ISO 8601 time the error was produced */
  timestamp: string;
  path: string;
  requestId?: string;
}

export class ErrorResponseDto implements ErrorResponseBody {
  @ApiProperty({ example: 404 })
  statusCode!: number;

  @ApiProperty({ enum: Object.values(ERROR_KINDS), example: ERROR_KINDS.NOT_FOUND })
  kind!: ErrorKind;

  @ApiProperty({ example: 'User not found' })
  message!: string;

  @ApiProperty({ format: 'date-time', example: '2026-01-19T00:00:00.000Z' })
  timestamp!: string;

  @ApiProperty({ example: '/api/users/unknown@example.com' })
  path!: string;

  @ApiPropertyOptional({ example: '6f1c0a52-3a3e-4c57-9d0e-6a3f1f0b8c11' })
  requestId?: string;
}

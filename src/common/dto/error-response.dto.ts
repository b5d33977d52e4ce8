import { HttpStatus } from '@nestjs/common';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class FieldErrorDto {
  @ApiProperty({ description: 'Wire path of the offending field', example: 'aparelho.numero_serie' })
  field!: string;

  @ApiProperty({ description: 'Reason code', example: 'INVALID_SERIAL' })
  reason!: string;
}

/**
 * Unified error response schema for all API endpoints
 */
export class ErrorResponseDto {
  @ApiProperty({
    description: 'HTTP status code',
    example: 422,
    enum: [
      HttpStatus.BAD_REQUEST,
      HttpStatus.UNPROCESSABLE_ENTITY,
      HttpStatus.INTERNAL_SERVER_ERROR,
      HttpStatus.SERVICE_UNAVAILABLE,
    ],
  })
  statusCode!: number;

  @ApiProperty({ description: 'Error code for client-side handling', example: 'VALIDATION_FAILED' })
  error!: string;

  @ApiProperty({ description: 'Human readable message', example: 'Ticket request failed validation' })
  message!: string;

  @ApiPropertyOptional({ description: 'Business rule violations, in a fixed order', type: [FieldErrorDto] })
  errors?: FieldErrorDto[];

  @ApiPropertyOptional({ description: 'Payload shape problems', type: [String] })
  details?: string[];

  @ApiProperty({ description: 'ISO timestamp of when the error occurred', example: '2024-01-15T12:00:00.000Z' })
  timestamp!: string;

  @ApiProperty({ description: 'API path where the error occurred', example: '/api/v1/tickets' })
  path!: string;
}

/**
 * Common error response examples for Swagger documentation
 */
export const ERROR_RESPONSES = {
  BAD_REQUEST: {
    status: 400,
    description: 'Bad Request - payload is not a ticket request',
    example: {
      statusCode: 400,
      error: 'BAD_REQUEST',
      message: 'Request body is not a valid ticket payload',
      details: ['cpf: cpf must be a string'],
      timestamp: '2024-01-15T12:00:00.000Z',
      path: '/api/v1/tickets',
    },
  },
  UNPROCESSABLE_ENTITY: {
    status: 422,
    description: 'Unprocessable Entity - business rules rejected the request',
    example: {
      statusCode: 422,
      error: 'VALIDATION_FAILED',
      message: 'Ticket request failed validation',
      errors: [
        { field: 'aparelho.numero_serie', reason: 'INVALID_SERIAL' },
        { field: 'aparelho.data_compra', reason: 'EXPIRED_WARRANTY' },
      ],
      timestamp: '2024-01-15T12:00:00.000Z',
      path: '/api/v1/tickets',
    },
  },
  SERVICE_UNAVAILABLE: {
    status: 503,
    description: 'Service Unavailable - the ticket could not be queued',
    example: {
      statusCode: 503,
      error: 'QUEUE_UNAVAILABLE',
      message: 'Ticket could not be queued, please retry',
      timestamp: '2024-01-15T12:00:00.000Z',
      path: '/api/v1/tickets',
    },
  },
  INTERNAL_SERVER_ERROR: {
    status: 500,
    description: 'Internal Server Error',
    example: {
      statusCode: 500,
      error: 'InternalServerError',
      message: 'Internal server error',
      timestamp: '2024-01-15T12:00:00.000Z',
      path: '/api/v1/tickets',
    },
  },
};

import { applyDecorators } from '@nestjs/common';
import { ApiExtraModels, ApiResponse, getSchemaPath } from '@nestjs/swagger';
import { ERROR_RESPONSES, ErrorResponseDto, FieldErrorDto } from '../dto/error-response.dto';

type ErrorResponseKey = keyof typeof ERROR_RESPONSES;

export function ApiErrorResponses(...keys: ErrorResponseKey[]) {
  const decorators = keys.map((key) => {
    const response = ERROR_RESPONSES[key];
    return ApiResponse({
      status: response.status,
      description: response.description,
      content: {
        'application/json': {
          schema: {
            $ref: getSchemaPath(ErrorResponseDto),
          },
          example: response.example,
        },
      },
    });
  });

  return applyDecorators(ApiExtraModels(ErrorResponseDto, FieldErrorDto), ...decorators);
}

import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { PipelineConfigService, ConfigValidationError, isConfigPatch } from '../services/pipeline-config';
import { SchemaValidationError } from '../services/model-response-validator';

/**
 * Error response body structure
 */
interface ErrorResponseBody {
  error: string;
  code: string;
  details?: SchemaValidationError[];
}

/**
 * Common CORS headers for all responses
 */
const CORS_HEADERS = {
  'Content-Type': 'application/json',
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type,Authorization',
  'Access-Control-Allow-Methods': 'GET,PATCH,OPTIONS'
};

function successResponse<T>(data: T, statusCode = 200): APIGatewayProxyResult {
  return {
    statusCode,
    headers: CORS_HEADERS,
    body: JSON.stringify(data)
  };
}

function errorResponse(
  statusCode: number,
  message: string,
  code: string,
  details?: SchemaValidationError[]
): APIGatewayProxyResult {
  const body: ErrorResponseBody = {
    error: message,
    code,
    ...(details && { details })
  };
  return {
    statusCode,
    headers: CORS_HEADERS,
    body: JSON.stringify(body)
  };
}

/**
 * Parse JSON body safely
 */
function parseBody(event: APIGatewayProxyEvent): unknown {
  try {
    if (!event.body) return null;
    return JSON.parse(event.body);
  } catch {
    return null;
  }
}

/**
 * GET /pipeline-config
 */
export async function getPipelineConfig(_event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const config = await PipelineConfigService.getConfig();
    return successResponse(config);
  } catch (error) {
    console.error('Error getting pipeline configuration:', error);
    return errorResponse(500, 'Internal server error', 'INTERNAL_ERROR');
  }
}

/**
 * PATCH /pipeline-config
 *
 * Partial update; nested groups merge field by field and unknown fields are rejected.
 */
export async function updatePipelineConfig(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const patch = parseBody(event);
    if (!isConfigPatch(patch)) {
      return errorResponse(400, 'Invalid request body', 'INVALID_BODY');
    }

    const config = await PipelineConfigService.updateConfig(patch);
    return successResponse(config);
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      return errorResponse(400, 'Validation failed', 'VALIDATION_FAILED', error.errors);
    }
    console.error('Error updating pipeline configuration:', error);
    return errorResponse(500, 'Internal server error', 'INTERNAL_ERROR');
  }
}

import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { PipelineQueryService } from '../services/pipeline-query';
import { OpportunityService } from '../services/opportunity';
import { ResourceNotFoundError } from '../db/access';
import { InvalidStateTransitionError } from '../utils/errors';
import { OpportunityDirection, OpportunityQuery, OpportunityStatus } from '../types/opportunity';

/**
 * Error response body structure
 */
interface ErrorResponseBody {
  error: string;
  code: string;
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

const STATUSES: OpportunityStatus[] = ['ACTIVE', 'EXECUTED', 'EXPIRED', 'CANCELLED'];
const DIRECTIONS: OpportunityDirection[] = ['LONG', 'SHORT'];
const MAX_LIMIT = 500;

function successResponse<T>(data: T, statusCode = 200): APIGatewayProxyResult {
  return {
    statusCode,
    headers: CORS_HEADERS,
    body: JSON.stringify(data)
  };
}

function errorResponse(statusCode: number, message: string, code: string): APIGatewayProxyResult {
  const body: ErrorResponseBody = { error: message, code };
  return {
    statusCode,
    headers: CORS_HEADERS,
    body: JSON.stringify(body)
  };
}

function isStatus(value: unknown): value is OpportunityStatus {
  return STATUSES.some(status => status === value);
}

function isDirection(value: unknown): value is OpportunityDirection {
  return DIRECTIONS.some(direction => direction === value);
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
 * Parse and validate the list query. Returns an error message for the first invalid parameter.
 */
function parseQuery(params: APIGatewayProxyEvent['queryStringParameters']): OpportunityQuery | string {
  const query: OpportunityQuery = {};

  const status = params?.status?.toUpperCase();
  if (status !== undefined) {
    if (!isStatus(status)) return `status must be one of: ${STATUSES.join(', ')}`;
    query.status = status;
  }

  const direction = params?.direction?.toUpperCase();
  if (direction !== undefined) {
    if (!isDirection(direction)) return `direction must be one of: ${DIRECTIONS.join(', ')}`;
    query.direction = direction;
  }

  if (params?.minScore !== undefined) {
    const minScore = Number(params.minScore);
    if (!Number.isFinite(minScore) || minScore < 0 || minScore > 1) return 'minScore must be a number in [0, 1]';
    query.minScore = minScore;
  }

  if (params?.limit !== undefined) {
    const limit = Number(params.limit);
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIMIT) return `limit must be an integer in [1, ${MAX_LIMIT}]`;
    query.limit = limit;
  }

  return query;
}

/**
 * GET /opportunities?status=ACTIVE&direction=LONG&minScore=0.5&limit=20
 */
export async function listOpportunities(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const query = parseQuery(event.queryStringParameters);
    if (typeof query === 'string') {
      return errorResponse(400, query, 'INVALID_PARAMETER');
    }

    const opportunities = await PipelineQueryService.listOpportunities(query);
    return successResponse({ opportunities });
  } catch (error) {
    console.error('Error listing opportunities:', error);
    return errorResponse(500, 'Internal server error', 'INTERNAL_ERROR');
  }
}

/**
 * GET /opportunities/{id}
 */
export async function getOpportunity(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const opportunityId = event.pathParameters?.id;
    if (!opportunityId) {
      return errorResponse(400, 'Missing opportunity ID', 'MISSING_PARAMETER');
    }

    const opportunity = await PipelineQueryService.getOpportunity(opportunityId);
    return successResponse(opportunity);
  } catch (error) {
    if (error instanceof ResourceNotFoundError) {
      return errorResponse(404, error.message, 'NOT_FOUND');
    }
    console.error('Error getting opportunity:', error);
    return errorResponse(500, 'Internal server error', 'INTERNAL_ERROR');
  }
}

/**
 * PATCH /opportunities/{id}/status
 *
 * Body: { "status": "EXECUTED" | "EXPIRED" | "CANCELLED" }
 */
export async function updateOpportunityStatus(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const opportunityId = event.pathParameters?.id;
    if (!opportunityId) {
      return errorResponse(400, 'Missing opportunity ID', 'MISSING_PARAMETER');
    }

    const body = parseBody(event);
    const status = typeof body === 'object' && body !== null && 'status' in body ? body.status : undefined;
    if (!isStatus(status)) {
      return errorResponse(400, `status must be one of: ${STATUSES.join(', ')}`, 'INVALID_BODY');
    }

    const opportunity = await OpportunityService.transitionStatus(opportunityId, status);
    return successResponse(opportunity);
  } catch (error) {
    if (error instanceof ResourceNotFoundError) {
      return errorResponse(404, error.message, 'NOT_FOUND');
    }
    if (error instanceof InvalidStateTransitionError) {
      return errorResponse(409, error.message, 'INVALID_STATE_TRANSITION');
    }
    console.error('Error updating opportunity status:', error);
    return errorResponse(500, 'Internal server error', 'INTERNAL_ERROR');
  }
}

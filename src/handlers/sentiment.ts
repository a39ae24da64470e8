import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { PipelineQueryService } from '../services/pipeline-query';
import { PipelineService } from '../services/pipeline';
import { ResourceNotFoundError } from '../db/access';
import { WindowType } from '../types/ticker-stats';

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
  'Access-Control-Allow-Methods': 'GET,POST,OPTIONS'
};

const DEFAULT_HEADLINE_HOURS = 24;
const MAX_HEADLINE_HOURS = 24 * 7;

const WINDOW_TYPES: WindowType[] = ['daily', 'intraday', 'momentum'];

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

function isWindowType(value: string): value is WindowType {
  return WINDOW_TYPES.some(windowType => windowType === value);
}

/**
 * GET /headlines/{id}
 */
export async function getHeadline(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const headlineId = event.pathParameters?.id;
    if (!headlineId) {
      return errorResponse(400, 'Missing headline ID', 'MISSING_PARAMETER');
    }

    const headline = await PipelineQueryService.getHeadline(headlineId);
    return successResponse(headline);
  } catch (error) {
    if (error instanceof ResourceNotFoundError) {
      return errorResponse(404, error.message, 'NOT_FOUND');
    }
    console.error('Error getting headline:', error);
    return errorResponse(500, 'Internal server error', 'INTERNAL_ERROR');
  }
}

/**
 * GET /tickers/{ticker}/headlines?hours=24
 */
export async function listHeadlines(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const ticker = event.pathParameters?.ticker?.trim().toUpperCase();
    if (!ticker) {
      return errorResponse(400, 'Missing ticker', 'MISSING_PARAMETER');
    }

    const hoursStr = event.queryStringParameters?.hours;
    const hours = hoursStr === undefined ? DEFAULT_HEADLINE_HOURS : Number(hoursStr);
    if (!Number.isFinite(hours) || hours <= 0 || hours > MAX_HEADLINE_HOURS) {
      return errorResponse(400, `hours must be a number in (0, ${MAX_HEADLINE_HOURS}]`, 'INVALID_PARAMETER');
    }

    const headlines = await PipelineQueryService.listHeadlines(ticker, hours);
    return successResponse({ headlines });
  } catch (error) {
    console.error('Error listing headlines:', error);
    return errorResponse(500, 'Internal server error', 'INTERNAL_ERROR');
  }
}

/**
 * GET /headlines/{id}/sentiment
 *
 * Aggregate (null while unscored) and model votes of a headline.
 */
export async function getHeadlineSentiment(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const headlineId = event.pathParameters?.id;
    if (!headlineId) {
      return errorResponse(400, 'Missing headline ID', 'MISSING_PARAMETER');
    }

    const sentiment = await PipelineQueryService.getSentiment(headlineId);
    return successResponse(sentiment);
  } catch (error) {
    if (error instanceof ResourceNotFoundError) {
      return errorResponse(404, error.message, 'NOT_FOUND');
    }
    console.error('Error getting headline sentiment:', error);
    return errorResponse(500, 'Internal server error', 'INTERNAL_ERROR');
  }
}

/**
 * POST /headlines/{id}/analyze
 *
 * Scores the headline again with the current model configuration. The
 * handler is bound to the worker's pipeline so it shares its gateway quotas.
 */
export function createAnalyzeHeadlineHandler(
  pipeline: Pick<PipelineService, 'reanalyze'>
): (event: APIGatewayProxyEvent) => Promise<APIGatewayProxyResult> {
  return async function analyzeHeadline(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
    try {
      const headlineId = event.pathParameters?.id;
      if (!headlineId) {
        return errorResponse(400, 'Missing headline ID', 'MISSING_PARAMETER');
      }

      const report = await pipeline.reanalyze([headlineId]);
      return successResponse(report);
    } catch (error) {
      if (error instanceof ResourceNotFoundError) {
        return errorResponse(404, error.message, 'NOT_FOUND');
      }
      console.error('Error analyzing headline:', error);
      return errorResponse(500, 'Internal server error', 'INTERNAL_ERROR');
    }
  };
}

/**
 * GET /ticker-stats/{window}?ticker=ACME
 */
export async function getTickerStats(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const windowType = event.pathParameters?.window;
    if (!windowType || !isWindowType(windowType)) {
      return errorResponse(400, `window must be one of: ${WINDOW_TYPES.join(', ')}`, 'INVALID_PARAMETER');
    }

    const ticker = event.queryStringParameters?.ticker?.trim().toUpperCase() || undefined;
    const stats = await PipelineQueryService.getTickerStats(windowType, ticker);
    return successResponse({ windowType, stats });
  } catch (error) {
    console.error('Error getting ticker stats:', error);
    return errorResponse(500, 'Internal server error', 'INTERNAL_ERROR');
  }
}

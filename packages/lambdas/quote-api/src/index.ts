import type { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import {
  DomainError,
  ValidationError,
  createQuoteService,
  type QuoteService,
} from '@channel-pricing/core';
import { loadConfig, type QuoteApiConfig } from './config';

/**
 * Parts of the API Gateway proxy event the quote API reads
 */
export type QuoteApiEvent = Pick<APIGatewayProxyEvent, 'httpMethod' | 'path' | 'body'>;

export type QuoteApiHandler = (
  event: QuoteApiEvent,
  context: Pick<Context, 'awsRequestId'>
) => Promise<APIGatewayProxyResult>;

class MalformedBodyError extends Error {}

/**
 * Decode a path segment; badly encoded segments are kept as sent
 */
function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch (error) {
    if (error instanceof URIError) {
      return segment;
    }
    throw error;
  }
}

/**
 * Extract path parameter from URL path
 * With proxy integration, pathParameters aren't populated automatically
 */
function getPathParam(path: string, position: number): string | undefined {
  const parts = path.split('/').filter(Boolean);
  return parts[position];
}

function parseBody(event: QuoteApiEvent): unknown {
  if (!event.body) {
    return {};
  }
  try {
    return JSON.parse(event.body);
  } catch (error) {
    throw new MalformedBodyError(error instanceof Error ? error.message : 'Unknown error');
  }
}

function response(statusCode: number, body: unknown, allowedOrigin: string): APIGatewayProxyResult {
  return {
    statusCode,
    headers: {
      'Content-Type': 'application/json',
      'Access-Control-Allow-Origin': allowedOrigin,
      'Access-Control-Allow-Headers': 'Content-Type, Authorization',
      'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
    },
    body: body ? JSON.stringify(body) : '',
  };
}

/**
 * Build the handler around a quote service
 */
export function createHandler(service: QuoteService, config: Pick<QuoteApiConfig, 'allowedOrigin'>): QuoteApiHandler {
  const reply = (statusCode: number, body: unknown) => response(statusCode, body, config.allowedOrigin);

  function route(event: QuoteApiEvent): APIGatewayProxyResult {
    const method = event.httpMethod;
    const [root, resource, channel] = [0, 1, 2].map((i) => getPathParam(event.path, i));

    if (root !== 'pricing' || !resource) {
      return reply(404, { error: 'Not found' });
    }

    if (method === 'GET' && resource === 'policies') {
      const policies = channel
        ? service.listPolicies(decodeSegment(channel))
        : service.listPolicies();
      return reply(200, { supportedChannels: service.supportedChannels(), policies });
    }

    if (method !== 'POST' || channel) {
      return reply(404, { error: 'Not found' });
    }

    switch (resource) {
      case 'quote':
        return reply(200, service.quote(parseBody(event)));
      case 'metrics':
        return reply(200, service.calculateMetrics(parseBody(event)));
      case 'validate': {
        const errors = service.validate(parseBody(event));
        return errors.length === 0 ? reply(200, { valid: true }) : reply(422, { valid: false, errors });
      }
      default:
        return reply(404, { error: 'Not found' });
    }
  }

  return async (event, context) => {
    console.log('[QuoteApi] Request', {
      method: event.httpMethod,
      path: event.path,
      requestId: context.awsRequestId,
    });

    // Handle CORS preflight
    if (event.httpMethod === 'OPTIONS') {
      return reply(200, null);
    }

    try {
      return route(event);
    } catch (error) {
      if (error instanceof MalformedBodyError) {
        console.warn('[QuoteApi] Malformed body', { requestId: context.awsRequestId, reason: error.message });
        return reply(400, { error: 'Request body must be valid JSON' });
      }

      if (error instanceof ValidationError) {
        console.warn('[QuoteApi] Rejected request', { requestId: context.awsRequestId, fields: error.fields });
        return reply(422, { error: error.message, code: 'VALIDATION_ERROR', errors: error.errors });
      }

      if (error instanceof DomainError) {
        console.warn('[QuoteApi] Domain error', { requestId: context.awsRequestId, code: error.code });
        if (error.code === 'UNSUPPORTED_CHANNEL') {
          return reply(422, { error: error.message, code: error.code, supportedChannels: error.supportedChannels });
        }
        return reply(409, { error: error.message, code: error.code });
      }

      console.error('[QuoteApi] Unhandled error', { requestId: context.awsRequestId }, error);

      // Never expose internal error details to clients
      return reply(500, { error: 'Internal server error' });
    }
  };
}

const config = loadConfig();

/**
 * Quote API Lambda handler
 */
export const handler: QuoteApiHandler = createHandler(createQuoteService(config.policies), config);

import fp from 'fastify-plugin';
import type { FastifyError, FastifyInstance, FastifyRequest } from 'fastify';
import type { AdditionalData, EventTags } from '../../domain/index.js';
import { reportError, type ErrorReporter } from '../reporting.js';

export interface ErrorReportingPluginOptions {
  reporter: ErrorReporter;
  /** Extra tags on every reported request error. */
  tags?: EventTags;
  /** Also report errors that Fastify answers with a 4xx (validation, 404 handlers). */
  reportClientErrors?: boolean;
}

function requestContext(request: FastifyRequest): AdditionalData {
  return {
    request_url: request.url,
    request_method: request.method,
    route: request.routeOptions.url ?? null,
    user_agent: request.headers['user-agent'] ?? null,
    remote_addr: request.ip,
  };
}

/**
 * Fastify plugin that reports route errors to HuntGlitch.
 *
 * Reporting is fire-and-forget from the `onError` hook: the response is
 * never delayed by delivery retries, and Fastify's own error reply is left
 * untouched.
 */
async function errorReportingPlugin(
  fastify: FastifyInstance,
  opts: ErrorReportingPluginOptions,
): Promise<void> {
  const tags: EventTags = { source: 'fastify', ...opts.tags };

  fastify.addHook('onError', async (request, _reply, error: FastifyError) => {
    const status = error.statusCode ?? 500;
    if (status < 500 && !opts.reportClientErrors) {
      return;
    }

    void reportError(opts.reporter, error, { ...requestContext(request), status_code: status }, tags);
  });
}

export default fp(errorReportingPlugin, {
  name: 'huntglitch-error-reporting',
  fastify: '5.x',
});

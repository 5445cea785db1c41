/**
 * Request Validation Middleware
 *
 * Validates the JSON body, query string or form body of a request against
 * a rule set before the route handler runs.
 *
 *   app.post('/users', validateRequest('json', {
 *       username: ['required', 'string', 'minLength:3'],
 *       email: ['required', 'email'],
 *   }), context => {
 *       const input = context.get('validated');
 *       ...
 *   });
 *
 * Invalid input answers 400 with the structured HttpError body. Defective
 * rule declarations are logged and rethrown for the application's error
 * handler.
 */

import type { Context, MiddlewareHandler } from 'hono';
import { HttpErrors } from '../errors/http-error.js';
import { logger } from '../logger.js';
import type { DataAccessor } from '../validation/data-accessor.js';
import { ValidationError, ValidationSystemError } from '../validation/errors.js';
import type { CustomMessages, RuleDefinitions } from '../validation/types.js';
import { Validator } from '../validation/validator.js';

// Extend Hono context for the validated input
declare module 'hono' {
    interface ContextVariableMap {
        validated: DataAccessor;
    }
}

export type ValidationTarget = 'json' | 'query' | 'form';

type ExtractedData =
    | { ok: true; data: object }
    | { ok: false; response: Response };

export function validateRequest(
    target: ValidationTarget,
    rules: RuleDefinitions,
    customMessages: CustomMessages = {}
): MiddlewareHandler {
    // Compile once; rule string errors surface when the route is declared
    const validator = new Validator(rules, customMessages);

    return async (context, next) => {
        const extracted = await extractData(context, target);
        if (!extracted.ok) {
            return extracted.response;
        }

        try {
            context.set('validated', validator.validate(extracted.data));
        } catch (error) {
            if (error instanceof ValidationError) {
                return context.json(error.toHttpError().toJSON(), 400);
            }

            logger.error('Request validation misconfigured', {
                path: context.req.path,
                target,
                code: error instanceof ValidationSystemError ? error.code : 'UNKNOWN',
                error: error instanceof Error ? error.message : String(error)
            });
            throw error;
        }

        await next();
    };
}

async function extractData(context: Context, target: ValidationTarget): Promise<ExtractedData> {
    switch (target) {
        case 'query':
            return { ok: true, data: context.req.query() };

        case 'form':
            return { ok: true, data: await context.req.parseBody() };

        case 'json': {
            let body: unknown;
            try {
                body = await context.req.json();
            } catch (error) {
                logger.debug('Request body is not valid JSON', {
                    path: context.req.path,
                    error: error instanceof Error ? error.message : String(error)
                });
                const httpError = HttpErrors.badRequest('Request body must be valid JSON', 'JSON_PARSE_ERROR');
                return { ok: false, response: context.json(httpError.toJSON(), 400) };
            }

            if (typeof body !== 'object' || body === null) {
                const httpError = HttpErrors.badRequest('Request body must be a JSON object or array', 'INVALID_BODY');
                return { ok: false, response: context.json(httpError.toJSON(), 400) };
            }

            return { ok: true, data: body };
        }
    }
}

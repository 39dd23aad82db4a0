/**
 * Express application factory with dependency injection.
 *
 * Creates an Express app with middleware wired in order:
 * 1. JSON body parser
 * 2. Customer contact report routes
 * 3. Field encryption error handling
 *
 * The factory accepts its services so tests can compose it with in-memory
 * collaborators.
 *
 * @module app
 */

import express from 'express';
import type { Request, Response, NextFunction } from 'express';

import { cryptoErrorHandler } from './middleware/cryptoErrorHandler.js';
import type { Logger } from './logging/logger.js';
import type { CustomerReportService } from './services/customerReportService.js';
import { API_ERROR_CODES, formatApiError, formatErrorResponse } from './utils/responses.js';

// ─── Dependency Types ────────────────────────────────────────────────────────

export interface AppDependencies {
  customerReport: CustomerReportService;
  logger: Logger;
}

const MAX_REPORT_LIMIT = 500;

// ─── Helpers ─────────────────────────────────────────────────────────────────

/**
 * Abort signal that fires when the client goes away before the response is
 * written, so in-flight key service calls are cancelled with it.
 */
function requestSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller.signal;
}

function parseLimit(raw: unknown): number | null | undefined {
  if (raw === undefined) return undefined;
  if (typeof raw !== 'string' || !/^\d+$/.test(raw)) return null;
  const limit = parseInt(raw, 10);
  return limit >= 1 && limit <= MAX_REPORT_LIMIT ? limit : null;
}

// ─── App Factory ─────────────────────────────────────────────────────────────

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  app.use(express.json());

  const router = express.Router();

  // GET /api/tenants/:tenantId/customers/contacts
  router.get(
    '/tenants/:tenantId/customers/contacts',
    async (req: Request, res: Response, next: NextFunction) => {
      const limit = parseLimit(req.query['limit']);
      if (limit === null) {
        const fields = { limit: [`must be an integer between 1 and ${MAX_REPORT_LIMIT}`] };
        const body = formatErrorResponse(
          API_ERROR_CODES.INVALID_REQUEST,
          'Invalid query parameters',
          undefined,
          fields,
        );
        res.status(400).json(body);
        return;
      }

      try {
        const contacts = await deps.customerReport.listContacts(
          req.params['tenantId'] ?? '',
          limit,
          { signal: requestSignal(res) },
        );
        res.status(200).json({ success: true, contacts });
      } catch (err) {
        next(err);
      }
    },
  );

  // GET /api/tenants/:tenantId/customers/:customerId/contact
  router.get(
    '/tenants/:tenantId/customers/:customerId/contact',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const contact = await deps.customerReport.getContact(
          req.params['tenantId'] ?? '',
          req.params['customerId'] ?? '',
          { signal: requestSignal(res) },
        );
        if (!contact) {
          res.status(404).json(formatApiError(API_ERROR_CODES.NOT_FOUND));
          return;
        }
        res.status(200).json({ success: true, contact });
      } catch (err) {
        next(err);
      }
    },
  );

  app.use('/api', router);

  // ── Global Error Handler ──────────────────────────────────────────────

  app.use(cryptoErrorHandler(deps.logger));

  return app;
}

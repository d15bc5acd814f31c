/**
 * Query API
 *
 * Read-only API over a persisted roster document.
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  runWithContext,
  getCorrelationId,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  type ErrorEnvelope,
  type CommitteeSummary,
  type ListResponse,
  type MemberSummary,
} from '@committee-roster/shared';
import type { RosterStore } from './lib/store';

const DEFAULT_LIMIT = 20;
const MAX_LIMIT = 100;

function correlationIdOf(res: Response): string {
  const header = res.getHeader('X-Correlation-Id');
  return typeof header === 'string' ? header : getCorrelationId();
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

function sendError(res: Response, status: number, code: string, message: string): void {
  const error: ErrorEnvelope = {
    error: {
      code,
      message,
      correlation_id: correlationIdOf(res),
    },
  };
  res.status(status).json(error);
}

export function createApp(store: RosterStore): Express {
  const app = express();

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const correlationId = req.get('x-correlation-id') || ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId, sourceName: store.document.source }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const routePath: unknown = req.route?.path;
      const path = typeof routePath === 'string' ? routePath : req.path;

      httpRequestDurationHistogram.observe(
        { method: req.method, path, status: res.statusCode.toString() },
        duration
      );
      httpRequestsCounter.inc({
        method: req.method,
        path,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  // Health check
  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: 'query-api',
      document: {
        source: store.document.source,
        status: store.document.status,
        coverDate: store.document.coverDate,
        extractedAt: store.document.extractedAt,
      },
      timestamp: new Date().toISOString(),
    });
  });

  // Metrics endpoint
  app.get('/metrics', async (req: Request, res: Response) => {
    try {
      res.setHeader('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      logger.error('Failed to collect metrics', error);
      sendError(res, 500, 'internal_error', 'Failed to collect metrics');
    }
  });

  /**
   * GET /committees
   * Every committee in document order
   */
  app.get('/committees', (req: Request, res: Response) => {
    try {
      const response: ListResponse<CommitteeSummary> = { items: store.listCommittees() };
      res.json(response);
    } catch (error) {
      logger.error('Failed to list committees', error);
      sendError(res, 500, 'internal_error', 'Failed to list committees');
    }
  });

  /**
   * GET /committees/:slug
   * Main roster plus subcommittee rosters of one committee
   */
  app.get('/committees/:slug', (req: Request, res: Response) => {
    const { slug } = req.params;

    try {
      const committee = store.getCommittee(slug);
      if (!committee) {
        sendError(res, 404, 'not_found', `Committee ${slug} not found`);
        return;
      }
      res.json(committee);
    } catch (error) {
      logger.error('Failed to get committee', error, { slug });
      sendError(res, 500, 'internal_error', 'Failed to retrieve committee');
    }
  });

  /**
   * GET /members
   * Search members by name fragment and state
   */
  app.get('/members', (req: Request, res: Response) => {
    try {
      const name = queryString(req.query.name);
      const state = queryString(req.query.state);
      const requested = parseInt(queryString(req.query.limit) ?? '', 10) || DEFAULT_LIMIT;
      const limit = Math.max(1, Math.min(requested, MAX_LIMIT));

      if (state && !/^[A-Za-z]{2}$/.test(state)) {
        sendError(res, 400, 'invalid_request', 'state must be a two-letter code');
        return;
      }

      const response: ListResponse<MemberSummary> = {
        items: store.searchMembers({ name, state }, limit),
      };
      res.json(response);
    } catch (error) {
      logger.error('Failed to search members', error);
      sendError(res, 500, 'internal_error', 'Failed to search members');
    }
  });

  /**
   * GET /members/:slug
   * Every assignment of one member
   */
  app.get('/members/:slug', (req: Request, res: Response) => {
    const { slug } = req.params;

    try {
      const member = store.getMember(slug);
      if (!member) {
        sendError(res, 404, 'not_found', `Member ${slug} not found`);
        return;
      }
      res.json(member);
    } catch (error) {
      logger.error('Failed to get member', error, { slug });
      sendError(res, 500, 'internal_error', 'Failed to retrieve member');
    }
  });

  app.use((req: Request, res: Response) => {
    sendError(res, 404, 'not_found', `Route ${req.method} ${req.path} not found`);
  });

  return app;
}

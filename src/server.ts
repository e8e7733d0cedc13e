/**
 * Shift Log HTTP API
 * The clock and report operations as JSON, for scripts and widgets
 */

import type http from 'http';
import express from 'express';
import cors from 'cors';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { BiDuration } from './biDuration';
import type { ClockResult } from './clockStore';
import {
  BiDurationParseError,
  ClockError,
  LogError,
  MonthParseError,
  ShiftlogError,
} from './errors';
import { createLogger } from './logger';
import { DEFAULT_MONTH, parseMonth } from './month';
import type { Tracker } from './tracker';
import type { ClockStatus, ReportBucket } from './types';

// ════════════════════════════════════════════════════════════════════
// SERIALIZATION
// ════════════════════════════════════════════════════════════════════

function serializeStatus(status: ClockStatus) {
  return {
    state: status.state,
    activeKind: status.activeKind ?? null,
    asOf: status.asOf.toISOString(),
    since: status.since?.toISOString() ?? null,
    until: status.until?.toISOString() ?? null,
  };
}

function serializeBucket(bucket: ReportBucket) {
  return {
    periodStart: bucket.periodStart.toISOString(),
    periodEnd: bucket.periodEnd.toISOString(),
    totalDuration: bucket.totalDuration.toFriendlyHoursString(),
    totalMilliseconds: bucket.totalDuration.milliseconds,
    shiftCount: bucket.shiftCount,
    avgShiftDuration: bucket.avgShiftDuration.toFriendlyHoursString(),
    avgShiftMilliseconds: bucket.avgShiftDuration.milliseconds,
  };
}

// ════════════════════════════════════════════════════════════════════
// REQUEST SCHEMAS
// ════════════════════════════════════════════════════════════════════

const ClockBodySchema = z
  .object({ offset: z.string().min(1).optional() })
  .default({});

const StatusQuerySchema = z
  .object({
    at: z.string().datetime({ offset: true }).optional(),
    offset: z.string().min(1).optional(),
  })
  .refine(query => !(query.at && query.offset), { message: 'Use either at or offset, not both' });

const WeeklyQuerySchema = z.object({
  month: z.string().min(1).optional(),
  spillOver: z.enum(['true', 'false']).optional(),
});

function httpStatusFor(error: ShiftlogError): number {
  if (error instanceof ClockError) return 409;
  if (error instanceof BiDurationParseError || error instanceof MonthParseError) return 400;
  if (error instanceof LogError) return error.detail.code === 'MalformedLog' ? 422 : 500;
  return 400;
}

// ════════════════════════════════════════════════════════════════════
// APP
// ════════════════════════════════════════════════════════════════════

export function createApp(tracker: Tracker): express.Express {
  const { config } = tracker;
  const logger = createLogger('Server', config.logLevel);

  const app = express();
  app.use(cors());
  app.use(express.json());

  // ── auth (only when a secret is configured) ───────────────────────

  function authenticateToken(req: express.Request, res: express.Response, next: express.NextFunction) {
    const secret = config.apiSecret;
    if (!secret) return next();

    const authHeader = req.headers.authorization;
    const token = authHeader?.startsWith('Bearer ') ? authHeader.slice(7) : null;

    if (!token) {
      return res.status(401).json({ error: 'No token provided' });
    }

    try {
      jwt.verify(token, secret);
      next();
    } catch (e) {
      logger.debug('Rejected token', e);
      return res.status(401).json({ error: 'Invalid token' });
    }
  }

  // ── root ───────────────────────────────────────────────────────────

  app.get('/', (_req, res) => {
    res.json({
      name: 'shiftlog',
      description: 'Append-only clock in/out log with weekly reports',
      timezone: config.timezone,
      endpoints: {
        status: '/api/status',
        clockIn: 'POST /api/clock-in',
        clockOut: 'POST /api/clock-out',
        toggle: 'POST /api/toggle',
        daily: '/api/reports/daily',
        weekly: '/api/reports/weekly',
      },
    });
  });

  app.use('/api', authenticateToken);

  // ── status ─────────────────────────────────────────────────────────

  app.get('/api/status', (req, res) => {
    const query = StatusQuerySchema.safeParse(req.query);
    if (!query.success) {
      return res.status(400).json({ error: query.error.issues.map(i => i.message).join('; ') });
    }

    const { at, offset } = query.data;
    const now = tracker.now();
    const asOf = at ? new Date(at) : offset ? BiDuration.parse(offset).addTo(now) : now;

    res.json({ status: serializeStatus(tracker.status(asOf)), currentTime: now.toISOString() });
  });

  // ── clock in / out ─────────────────────────────────────────────────

  const clockRoute = (action: (offset?: BiDuration) => ClockResult): express.RequestHandler =>
    (req, res) => {
      const body = ClockBodySchema.safeParse(req.body);
      if (!body.success) {
        return res.status(400).json({ error: body.error.issues.map(i => i.message).join('; ') });
      }

      const offset = body.data.offset ? BiDuration.parse(body.data.offset) : undefined;
      const result = action(offset);

      if ('error' in result) {
        return res.status(httpStatusFor(result.error)).json({
          error: result.error.message,
          code: result.error.detail.code,
        });
      }

      res.status(201).json({
        entry: { kind: result.kind, timestamp: result.timestamp.toISOString() },
      });
    };

  app.post('/api/clock-in', clockRoute(offset => tracker.clockIn(offset)));
  app.post('/api/clock-out', clockRoute(offset => tracker.clockOut(offset)));
  app.post('/api/toggle', clockRoute(offset => tracker.toggle(offset)));

  // ── reports ────────────────────────────────────────────────────────

  app.get('/api/reports/daily', (_req, res) => {
    res.json({ buckets: tracker.dailyReport().map(serializeBucket) });
  });

  app.get('/api/reports/weekly', (req, res) => {
    const query = WeeklyQuerySchema.safeParse(req.query);
    if (!query.success) {
      return res.status(400).json({ error: query.error.issues.map(i => i.message).join('; ') });
    }

    const month = query.data.month ? parseMonth(query.data.month) : DEFAULT_MONTH;
    const spillOver = query.data.spillOver === 'true';

    res.json({ month, spillOver, buckets: tracker.weeklyReport(month, spillOver).map(serializeBucket) });
  });

  // ── errors ─────────────────────────────────────────────────────────

  app.use((err: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) return next(err);

    if (err instanceof ShiftlogError) {
      const code = 'detail' in err && isCoded(err.detail) ? err.detail.code : err.name;
      return res.status(httpStatusFor(err)).json({ error: err.message, code, hint: err.hint });
    }

    // body-parser and friends attach a 4xx status
    if (hasClientStatus(err)) {
      return res.status(err.status).json({ error: err.message });
    }

    logger.error('Unhandled error', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

function isCoded(detail: unknown): detail is { code: string } {
  return typeof detail === 'object' && detail !== null && 'code' in detail && typeof detail.code === 'string';
}

function hasClientStatus(err: unknown): err is Error & { status: number } {
  return err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500;
}

// ════════════════════════════════════════════════════════════════════
// START SERVER
// ════════════════════════════════════════════════════════════════════

export function startServer(tracker: Tracker, port = tracker.config.port): Promise<http.Server> {
  const logger = createLogger('Server', tracker.config.logLevel === 'silent' ? 'silent' : 'info');
  const app = createApp(tracker);

  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      logger.info(`Listening on http://localhost:${port}/api (log: ${tracker.config.outputFile})`);
      resolve(server);
    });
    server.on('error', reject);
  });
}

/** Bearer token for the API, signed with the configured secret */
export function issueToken(secret: string, expiresInSeconds?: number): string {
  return jwt.sign({ sub: 'shiftlog' }, secret, expiresInSeconds ? { expiresIn: expiresInSeconds } : {});
}

/**
 * RepoPulse — Pipeline Trigger Server
 *
 * Minimal Express server the external scheduler calls to start a run.
 *
 * Endpoints:
 * - POST /runs    — signed trigger, runs the pipeline and returns its summary
 * - GET /health   — health check for monitoring
 *
 * Run with: npm run server
 */

import crypto from 'crypto';
import { config as loadEnv } from 'dotenv';
import express, { type Express, type Request, type Response } from 'express';
import { loadConfig, loadTriggerSettings } from '../config';
import { describeError, logger } from '../lib/logger';
import { runPipeline, type PipelineSummary } from '../pipeline/workflow';

const log = logger.child({ component: 'trigger' });

// ============================================================
// SIGNATURE VERIFICATION
// ============================================================

/**
 * Verify an HMAC SHA-256 signature sent as "sha256=<hex>".
 */
export function verifySignature(payload: Buffer | string, signature: string | undefined, secret: string): boolean {
  if (!signature) return false;

  const parts = signature.split('=');
  if (parts.length !== 2 || parts[0] !== 'sha256' || !parts[1]) return false;

  const digest = crypto.createHmac('sha256', secret).update(payload).digest();
  const provided = Buffer.from(parts[1], 'hex');

  if (provided.length !== digest.length) return false;
  return crypto.timingSafeEqual(digest, provided);
}

export function signPayload(payload: Buffer | string, secret: string): string {
  return `sha256=${crypto.createHmac('sha256', secret).update(payload).digest('hex')}`;
}

// ============================================================
// EXPRESS APP
// ============================================================

export interface TriggerAppOptions {
  secret: string;
  runPipeline: () => Promise<PipelineSummary>;
}

export function createTriggerApp(options: TriggerAppOptions): Express {
  const app = express();
  let activeRun: Promise<PipelineSummary> | null = null;

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: 'repopulse-trigger',
      running: activeRun !== null,
    });
  });

  app.post('/runs', express.raw({ type: '*/*' }), async (req: Request, res: Response) => {
    const rawBody: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);

    if (!verifySignature(rawBody, req.get('x-signature-256'), options.secret)) {
      log.warn('Invalid trigger signature');
      res.status(401).json({ error: 'Invalid signature' });
      return;
    }

    if (activeRun) {
      res.status(409).json({ error: 'A pipeline run is already in progress' });
      return;
    }

    const run = options.runPipeline();
    activeRun = run;

    try {
      const summary = await run;
      res.status(summary.success ? 200 : 500).json(summary);
    } catch (error) {
      log.error('Triggered run aborted', { error: describeError(error) });
      res.status(500).json({ error: describeError(error) });
    } finally {
      activeRun = null;
    }
  });

  return app;
}

// ============================================================
// SERVER STARTUP
// ============================================================

if (import.meta.url === `file://${process.argv[1]}`) {
  loadEnv();

  try {
    const appConfig = loadConfig();
    const trigger = loadTriggerSettings();
    const app = createTriggerApp({
      secret: trigger.secret,
      runPipeline: () => runPipeline(appConfig),
    });

    app.listen(trigger.port, () => {
      log.info('Trigger server started', { port: trigger.port });
    });
  } catch (error) {
    log.error('Trigger server failed to start', { error: describeError(error) });
    process.exit(1);
  }
}

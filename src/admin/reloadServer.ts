import express, { type ErrorRequestHandler, type Express, type Request, type Response } from 'express';
import type { Server } from 'node:http';
import { z } from 'zod';
import type { Logger } from '../infra/logger/logger.js';
import type { PuppetEntryInput } from '../core/model/Puppet.js';
import type { PuppetReloadService, ReloadOutcome } from '../core/puppet/PuppetReloadService.js';
import { ValidationError, errorMessage } from '../core/errors.js';

export const RELOAD_PATH = '/api/reload-puppets';

const PuppetInputSchema = z.object({
  slug: z.string(),
  identity: z.string(),
  credential: z.string(),
});

const PuppetListSchema = z.array(PuppetInputSchema);
const ReloadBodySchema = z.object({ puppets: PuppetListSchema });

export interface ReloadServerOptions {
  maxBodyBytes: number;
}

/**
 * Parse a non-empty reload body. Accepts `{"puppets": [...]}` or a bare
 * array; an empty list is valid and clears every puppet.
 */
export function parseReloadBody(raw: string): PuppetEntryInput[] {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ValidationError('Request body is not valid JSON');
  }

  const parsed = Array.isArray(json)
    ? PuppetListSchema.safeParse(json)
    : ReloadBodySchema.transform((body) => body.puppets).safeParse(json);
  if (!parsed.success) {
    throw new ValidationError(
      'Request body must be {"puppets": [{"slug", "identity", "credential"}, ...]}',
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return parsed.data;
}

function errorStatus(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

export function createReloadApp(
  service: PuppetReloadService,
  logger: Logger,
  options: ReloadServerOptions,
): Express {
  const app = express();
  app.disable('x-powered-by');

  const readBody = express.text({ type: () => true, limit: options.maxBodyBytes });

  app.all(RELOAD_PATH, readBody, async (req: Request, res: Response) => {
    if (req.method !== 'POST') {
      res.set('Allow', 'POST').status(405).json({ error: 'Method not allowed' });
      return;
    }

    const raw: unknown = req.body;
    const text = typeof raw === 'string' ? raw : '';
    const remote = req.ip ?? req.socket.remoteAddress ?? 'unknown';

    let outcome: ReloadOutcome;
    try {
      if (text.trim() === '') {
        logger.info('admin', `Puppet reload requested by ${remote} (source=env)`);
        outcome = await service.reloadFromSource();
      } else {
        const entries = parseReloadBody(text);
        logger.info(
          'admin',
          `Puppet reload requested by ${remote} (source=body entries=${entries.length})`,
        );
        outcome = await service.reloadFromEntries(entries);
      }
    } catch (err) {
      if (err instanceof ValidationError) {
        logger.warn('admin', `Rejected reload from ${remote}: ${err.message}`);
        res.status(400).json({ error: err.message, issues: err.issues });
        return;
      }
      logger.error('admin', `Reload failed: ${errorMessage(err)}`);
      res.status(500).json({ error: 'Reload failed' });
      return;
    }

    res.status(200).json({
      added: outcome.added.length,
      removed: outcome.removed.length,
      total: outcome.total,
    });
  });

  const handleBodyErrors: ErrorRequestHandler = (err: unknown, _req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const status = errorStatus(err);
    if (status === 413) {
      logger.warn('admin', `Rejected reload: body over ${options.maxBodyBytes} bytes`);
      res.status(413).json({ error: 'Request body too large' });
      return;
    }
    if (status !== undefined && status >= 400 && status < 500) {
      res.status(400).json({ error: errorMessage(err) });
      return;
    }
    logger.error('admin', `Unhandled admin error: ${errorMessage(err)}`);
    res.status(500).json({ error: 'Internal error' });
  };
  app.use(handleBodyErrors);

  return app;
}

export function listen(app: Express, host: string, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('listening', () => resolve(server));
    server.once('error', reject);
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

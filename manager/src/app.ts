/**
 * Manager HTTP API — CRUD over Ray clusters in a Kubernetes namespace.
 *
 * GET    /clusters            list clusters
 * GET    /clusters/:name      head service details (used by the proxy)
 * POST   /clusters            install a cluster via helm
 * DELETE /clusters/:name      delete the RayCluster resource
 * GET    /health              kubectl reachability
 *
 * Cluster routes take an optional ?namespace= overriding the default.
 */

import express, { type ErrorRequestHandler, type Request } from 'express';
import { z } from 'zod';
import {
  RaygateError,
  ValidationError,
  isValidClusterName,
  isValidNamespace,
} from '@raygate/shared';
import type { ErrorBody } from '@raygate/shared';
import type { ClusterDao, ClusterDaoFactory } from './clusterDao.js';
import { checkHealth } from './healthCheck.js';

export interface AppOptions {
  factory: ClusterDaoFactory;
  /** Namespace used when a request does not name one */
  namespace: string;
}

const CreateClusterSchema = z.object({
  name: z.string().refine(isValidClusterName, {
    message: 'must be a lower-case RFC 1123 label of at most 53 characters',
  }),
});

export function createApp(options: AppOptions): express.Express {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  const daoFor = (req: Request): ClusterDao => {
    const requested = req.query.namespace;
    if (requested === undefined) {
      return options.factory.createInstance(options.namespace);
    }
    if (typeof requested !== 'string' || !isValidNamespace(requested)) {
      throw new ValidationError(`Invalid namespace: ${String(requested)}`);
    }
    return options.factory.createInstance(requested);
  };

  const clusterName = (req: Request): string => {
    const { name } = req.params;
    if (!isValidClusterName(name)) {
      throw new ValidationError(`Invalid cluster name: ${name}`);
    }
    return name;
  };

  app.get('/health', async (_req, res) => {
    const status = await checkHealth(options.factory.createInstance(options.namespace));
    res.status(status.healthy ? 200 : 503).json(status);
  });

  app.get('/clusters', async (req, res, next) => {
    try {
      const clusters = await daoFor(req).getAll();
      res.json({ clusters });
    } catch (err) {
      next(err);
    }
  });

  app.get('/clusters/:name', async (req, res, next) => {
    try {
      const details = await daoFor(req).get(clusterName(req));
      res.json(details);
    } catch (err) {
      next(err);
    }
  });

  app.post('/clusters', async (req, res, next) => {
    try {
      const parsed = CreateClusterSchema.safeParse(req.body);
      if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`);
        throw new ValidationError(`Invalid request body: ${issues.join('; ')}`);
      }
      const cluster = await daoFor(req).create(parsed.data);
      res.status(201).json(cluster);
    } catch (err) {
      next(err);
    }
  });

  app.delete('/clusters/:name', async (req, res, next) => {
    try {
      await daoFor(req).delete(clusterName(req));
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  app.use(errorHandler);

  return app;
}

/** Maps typed errors to their status code; anything else is a 500. */
const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  const status = err instanceof RaygateError ? err.statusCode : clientErrorStatus(err) ?? 500;
  const message = err instanceof Error ? err.message : String(err);

  if (status >= 500) {
    console.error(`[manager] ${req.method} ${req.path} failed: ${message}`);
  }

  const body: ErrorBody = { success: false, error: message };
  res.status(status).json(body);
};

/** body-parser rejects malformed JSON with a 4xx `status` on the error. */
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 500 ? err.status : undefined;
  }
  return undefined;
}

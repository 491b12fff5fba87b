/**
 * Health Check Endpoint Handler
 *
 * Returns server status, storage backend, version, and timestamp.
 */

import type { Request, Response } from 'express';
import { appConfig } from '../config.js';

export function healthHandler(_req: Request, res: Response): void {
  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    storage: appConfig.storage.backend,
    version: process.env.npm_package_version ?? 'dev',
  });
}

/**
 * HTTP Server
 *
 * Express routes over the device handlers. Handler error codes map onto
 * status codes; image captures are sent as raw bytes.
 */

import express, { type Express, type Request, type Response } from 'express';
import type { Server } from 'node:http';
import { createSubsystemLogger, errorMessage } from '../logging/subsystem.js';
import type { DeviceContext } from '../device/bootstrap.js';
import {
  createDeviceHandlers,
  type DeviceHandlers,
  type HandlerError,
  type HandlerResult,
  type ImagePayload,
} from './server-methods/device-health.js';

const log = createSubsystemLogger('gateway/http');

const STATUS_BY_CODE: Record<string, number> = {
  CAPABILITY_UNAVAILABLE: 404,
  INVALID_INPUT: 400,
};

export function statusForError(error: HandlerError): number {
  return STATUS_BY_CODE[error.code] ?? 500;
}

function sendError(res: Response, error: HandlerError): void {
  res.status(statusForError(error)).json({
    error: error.message,
    code: error.code,
    ...(error.details ? { details: error.details } : {}),
  });
}

function sendJson<T>(res: Response, result: HandlerResult<T>): void {
  if (result.ok) {
    res.json(result.data);
  } else {
    sendError(res, result.error);
  }
}

function sendImage(res: Response, result: HandlerResult<ImagePayload>): void {
  if (result.ok) {
    res.type(result.data.contentType).send(result.data.data);
  } else {
    sendError(res, result.error);
  }
}

/**
 * Builds the express app. Handlers can be passed in for tests.
 */
export function createHttpApp(
  context: DeviceContext,
  handlers: DeviceHandlers = createDeviceHandlers(context),
): Express {
  const app = express();
  app.disable('x-powered-by');

  app.use((req, _res, next) => {
    log.debug('Request', { method: req.method, path: req.path });
    next();
  });

  app.get('/health', async (_req: Request, res: Response) => {
    sendJson(res, await handlers['health.getRaw']());
  });

  app.get('/health/summary', async (_req: Request, res: Response) => {
    sendJson(res, await handlers['health.getSummary']());
  });

  app.get('/platform', async (_req: Request, res: Response) => {
    sendJson(res, await handlers['platform.getInfo']());
  });

  app.get('/camera', async (_req: Request, res: Response) => {
    sendJson(res, await handlers['camera.getInfo']());
  });

  app.get('/camera/capture', async (_req: Request, res: Response) => {
    sendImage(res, await handlers['camera.capture']());
  });

  app.get('/screenshot', async (_req: Request, res: Response) => {
    sendImage(res, await handlers['screenshot.capture']());
  });

  app.get('/player', async (_req: Request, res: Response) => {
    sendJson(res, await handlers['player.getStatus']());
  });

  app.post('/player/restart', async (_req: Request, res: Response) => {
    sendJson(res, await handlers['player.restart']());
  });

  app.get('/services/:name', async (req: Request<{ name: string }>, res: Response) => {
    sendJson(res, await handlers['services.getStatus']({ service: req.params.name }));
  });

  app.post('/services/:name/restart', async (req: Request<{ name: string }>, res: Response) => {
    sendJson(res, await handlers['services.restart']({ service: req.params.name }));
  });

  app.get('/tracker', async (_req: Request, res: Response) => {
    sendJson(res, await handlers['tracker.getInfo']());
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found', code: 'NOT_FOUND' });
  });

  return app;
}

export interface RunningServer {
  server: Server;
  port: number;
  stop(): Promise<void>;
}

/**
 * Starts listening on the configured host and port
 */
export async function startHttpServer(context: DeviceContext): Promise<RunningServer> {
  const { host, port } = context.config.server;
  const app = createHttpApp(context);

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(port, host, () => resolve(listening));
    listening.once('error', reject);
  });

  const address = server.address();
  const boundPort = typeof address === 'object' && address !== null ? address.port : port;
  log.info('HTTP server listening', { host, port: boundPort, platform: context.platform });

  return {
    server,
    port: boundPort,
    stop: () =>
      new Promise<void>((resolve, reject) => {
        server.close(error => {
          if (error) {
            log.error('Failed to close HTTP server', { error: errorMessage(error) });
            reject(error);
            return;
          }
          log.info('HTTP server closed');
          resolve();
        });
      }),
  };
}

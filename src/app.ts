import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { HttpError } from './httpError.js';
import { logger } from './logger.js';
import { DeviceAccessError, DeviceNotFoundError } from './devices/usbAudioService.js';
import type { UsbAudioService } from './devices/usbAudioService.js';
import { TransferError } from './usb/clockQuery.js';
import { createLoggerObserver } from './usb/observer.js';
import { parseAudioDescriptors, requireSampleRate } from './usb/resolver.js';
import { HexParseError, parseHexBytes } from './utils/hex.js';
import { parseDescriptorRequest, parseDeviceId, parseFlag } from './validation.js';

export { HttpError } from './httpError.js';

export function toHttpError(error: unknown): HttpError | null {
  if (error instanceof HttpError) return error;
  if (error instanceof DeviceNotFoundError) {
    return new HttpError(404, error.message, { message: error.message, deviceId: error.deviceId });
  }
  if (error instanceof DeviceAccessError) {
    return new HttpError(502, error.message, { message: error.message, deviceId: error.deviceId });
  }
  if (error instanceof TransferError) {
    return new HttpError(502, error.message, { message: error.message, reason: error.reason });
  }
  if (error instanceof HexParseError) {
    return new HttpError(400, error.message);
  }
  return null;
}

type AsyncHandler = (req: express.Request, res: express.Response) => Promise<void>;

function route(handler: AsyncHandler) {
  return async (req: express.Request, res: express.Response, next: express.NextFunction) => {
    try {
      await handler(req, res);
    } catch (error) {
      const httpError = toHttpError(error);
      if (httpError) {
        res.status(httpError.statusCode).json(httpError.payload ?? { message: httpError.message });
        return;
      }
      next(error);
    }
  };
}

export function createDeviceListHandler(service: UsbAudioService) {
  return route(async (req, res) => {
    const audioOnly = parseFlag(req.query.audioOnly, 'audioOnly');
    const devices = await service.listDevices(audioOnly === undefined ? {} : { audioOnly });
    res.json(devices);
  });
}

export function createDeviceAudioHandler(service: UsbAudioService) {
  return route(async (req, res) => {
    const deviceId = parseDeviceId(req.params.deviceId);
    const requireRate = parseFlag(req.query.requireRate, 'requireRate') ?? false;
    const info = await service.getDeviceAudioInfo(deviceId);
    if (requireRate) requireSampleRate(info);
    res.json(info);
  });
}

export function createDescriptorParseHandler() {
  return route(async (req, res) => {
    const { hex } = parseDescriptorRequest(req.body);
    const raw = parseHexBytes(hex);
    const profile = await parseAudioDescriptors(raw, {
      observer: createLoggerObserver(logger, { source: 'upload' }),
    });
    res.json({ bytes: raw.byteLength, ...profile });
  });
}

export interface AppOptions {
  service: UsbAudioService;
  allowedOrigins?: string[];
  /** Re-reads `.env` and config.json; omitted in tests. */
  reload?: () => Promise<void>;
}

export function createApp({ service, allowedOrigins = [], reload }: AppOptions): express.Express {
  const app = express();

  app.use(
    cors({
      origin: (origin, callback) => {
        // same-host tools like curl send no Origin
        if (!origin || allowedOrigins.includes(origin)) {
          callback(null, true);
          return;
        }
        callback(new Error('Not allowed by CORS'));
      },
    })
  );
  app.use(express.json({ limit: '1mb' }));
  app.use(helmet());
  if (process.env.NODE_ENV !== 'test') {
    app.use(morgan('dev'));
  }

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok', time: new Date().toISOString() });
  });

  app.get('/api/config', (_req, res) => {
    res.json({ usb: service.getSettings() });
  });

  app.get('/api/devices', createDeviceListHandler(service));
  app.get('/api/devices/:deviceId/audio', createDeviceAudioHandler(service));
  app.post('/api/descriptors/parse', createDescriptorParseHandler());

  app.post(
    '/api/admin/reload-config',
    route(async (_req, res) => {
      if (!reload) {
        throw new HttpError(501, 'config reload is not available');
      }
      await reload();
      res.json({ status: 'ok', usb: service.getSettings() });
    })
  );

  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error({ event: 'server_error', message: err.message });
    res.status(500).json({ message: err.message });
  });

  return app;
}

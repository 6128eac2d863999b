import { createServer } from 'node:http';
import { createApp } from './app.js';
import { loadConfig, reloadConfig } from './config.js';
import { UsbAudioService } from './devices/usbAudioService.js';
import { logger } from './logger.js';
import { NodeUsbDeviceSource } from './usb/nodeUsbSource.js';
import { loadEnvironment, parseAllowedOrigins, reloadEnvironment, resolvePort } from './utils/env.js';

loadEnvironment();

async function bootstrap() {
  const config = await loadConfig();
  const service = new UsbAudioService(new NodeUsbDeviceSource(), config.usb, logger);

  const app = createApp({
    service,
    allowedOrigins: parseAllowedOrigins(),
    reload: async () => {
      reloadEnvironment();
      reloadConfig();
      const refreshed = await loadConfig();
      service.updateSettings(refreshed.usb);
      logger.info({ event: 'config_reloaded', usb: refreshed.usb });
    },
  });

  const server = createServer(app);
  const port = resolvePort(config.server.port);
  server.listen(port, () => {
    logger.info({ event: 'server_started', port, usb: config.usb });
  });
}

if (process.env.NODE_ENV !== 'test') {
  bootstrap().catch((error) => {
    logger.fatal({ event: 'server_bootstrap_failed', message: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  });
}

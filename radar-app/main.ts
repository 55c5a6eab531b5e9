import { config } from 'dotenv';
import { resolve } from 'path';
import { ConfigError, ConnectionManager, loadAppConfig, scanLogger } from '../radar-ws-client';
import type { AppConfig } from '../radar-ws-client';
import { DisplayBridge, RadarDisplayState } from '../radar-display';

// Load .env.local from project root before reading configuration
const envPath = resolve(__dirname, '../..', '.env.local');
config({ path: envPath });

function readConfig(): AppConfig | null {
  try {
    return loadAppConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      scanLogger.error(`Invalid configuration (${error.key})`, error, 'APP');
      return null;
    }
    throw error;
  }
}

function main(): void {
  const appConfig = readConfig();
  if (!appConfig) {
    process.exitCode = 1;
    return;
  }

  scanLogger.configure(appConfig.logging);
  scanLogger.info(`Loaded env from: ${envPath}`, undefined, 'APP');

  const manager = new ConnectionManager(appConfig.client);
  const display = new RadarDisplayState();
  const bridge = new DisplayBridge(display, { frameIntervalMs: appConfig.display.frameIntervalMs });

  let lastConnectivity = display.snapshot().connectivity;
  display.subscribe(frame => {
    if (frame.connectivity !== lastConnectivity) {
      lastConnectivity = frame.connectivity;
      scanLogger.info(`Sensor ${frame.connectivity}`, undefined, 'DISPLAY');
    }
    if (frame.targetPixel) {
      scanLogger.debug(`Beam ${frame.beamAngleDegrees}° target at (${frame.targetPixel.x}, ${frame.targetPixel.y})`, undefined, 'DISPLAY');
    } else {
      scanLogger.debug(`Beam ${frame.beamAngleDegrees}° no target`, undefined, 'DISPLAY');
    }
  });

  bridge.attach(manager);
  manager.start();

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    scanLogger.info(`Received ${signal}, shutting down`, undefined, 'APP');
    manager.stop()
      .then(() => {
        bridge.detach();
        scanLogger.info('Session stats', manager.getStats(), 'APP');
        scanLogger.close();
        process.exit(0);
      })
      .catch(error => {
        scanLogger.error('Shutdown failed', error, 'APP');
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main();

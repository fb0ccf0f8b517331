// Voice Satellite - Entry point
// Wires the orchestrator to the backend client, host devices and control server.

import "dotenv/config";
import { pathToFileURL } from "node:url";
import { loadConfig, initialSettings, type SatelliteConfig } from "./config.js";
import { ConversationClient } from "./conversation-client.js";
import { VoiceOrchestrator } from "./orchestrator.js";
import { TimerManager } from "./timer-manager.js";
import { SettingsStore } from "./settings-store.js";
import { createAppServer, type AppServer } from "./server.js";
import {
  FileTtsPlayer,
  IdleMediaPlayer,
  LivenessWatchdog,
  LoggingBeeper,
  LoggingStatusLed,
  PcmFileCapture,
  StatusBus,
} from "./host-devices.js";
import { createConsoleLogger, errorMessage } from "./logger.js";

export const APP_NAME = "Voice Satellite";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

export interface Satellite {
  orchestrator: VoiceOrchestrator;
  server: AppServer;
  settingsStore: SettingsStore;
  start(): Promise<void>;
  stop(): Promise<void>;
}

/** Builds every component without opening sockets or ports. */
export async function createSatellite(config: SatelliteConfig): Promise<Satellite> {
  logInit(`Loading settings from ${config.settingsFile}...`);
  const settingsStore = new SettingsStore(config.settingsFile, initialSettings(config));
  const settings = await settingsStore.load();

  logInit(config.capturePcmFile ? `Replaying microphone input from ${config.capturePcmFile}` : "No capture file; microphone input is silence");
  const capture = await PcmFileCapture.fromFile(config.capturePcmFile, { logger: createConsoleLogger("Capture") });

  logInit(`Backend: ${config.backendUrl}`);
  const client = new ConversationClient({
    url: config.backendUrl,
    accessToken: config.backendToken,
    httpBaseUrl: config.httpBaseUrl,
    reconnectDelayMs: config.reconnectDelayMs,
  });

  const statusBus = new StatusBus();
  const watchdog = new LivenessWatchdog();
  const timers = new TimerManager();

  const orchestrator = new VoiceOrchestrator({
    client,
    capture,
    tts: new FileTtsPlayer(config.outputDir),
    media: new IdleMediaPlayer(),
    led: new LoggingStatusLed(),
    publisher: statusBus,
    beeper: new LoggingBeeper(),
    watchdog,
    timers,
    settings,
    config: { responseTimeoutMs: config.responseTimeoutMs },
  });

  const server = createAppServer({ orchestrator, settingsStore, statusBus, watchdog });

  return {
    orchestrator,
    server,
    settingsStore,
    async start() {
      await server.listen(config.controlPort);
      await orchestrator.start();
    },
    async stop() {
      await orchestrator.stop();
      timers.stopAll();
      await server.close();
    },
  };
}

async function main(): Promise<void> {
  let config: SatelliteConfig;
  try {
    config = loadConfig();
  } catch (err) {
    logFatal(errorMessage(err));
    process.exit(1);
  }
  logInit("Configuration loaded");

  const satellite = await createSatellite(config);
  await satellite.start();
  logInit(`${APP_NAME} v${APP_VERSION} control server at http://localhost:${config.controlPort}`);
  logInit("Ready for wake word");

  const shutdown = (signal: string) => {
    logInit(`${signal} received, shutting down...`);
    satellite.stop().then(
      () => process.exit(0),
      (err) => {
        logFatal(`Shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main().catch((err) => {
    logFatal(errorMessage(err));
    process.exit(1);
  });
}

/**
 * IMU cursor entry point.
 *
 * Reads orientation quaternions from the IMU board (or stdin), turns them into
 * cursor motion at a fixed rate and logs where the cursor is.
 *
 *   IMU_SERIAL_PORT=/dev/ttyACM0 npx tsx src/main.ts
 *   npx tsx scripts/generateDemoStream.ts | IMU_SOURCE=stdin npx tsx src/main.ts
 */

import { loadAppConfig, type AppConfig } from "./lib/config/appConfig";
import type { IConnection } from "./lib/connection/IConnection";
import { LineSampleSource } from "./lib/connection/LineSampleSource";
import { SampleDriver } from "./lib/connection/SampleDriver";
import { SerialConnection } from "./lib/connection/SerialConnection";
import { StreamConnection } from "./lib/connection/StreamConnection";
import { CursorPipeline } from "./lib/motion";
import { createCursorStore } from "./store/cursorStore";
import { log } from "./lib/logger";

function createConnection(
  config: AppConfig,
  source: LineSampleSource,
): IConnection {
  if (config.source === "stdin") {
    return new StreamConnection(source, process.stdin);
  }
  return new SerialConnection(source, {
    path: config.serialPath,
    baudRate: config.baudRate,
  });
}

async function main(): Promise<void> {
  const config = loadAppConfig(process.env);

  const source = new LineSampleSource();
  const pipeline = new CursorPipeline(config.motion);
  const store = createCursorStore();
  const driver = new SampleDriver(source, pipeline, store, {
    pollHz: config.pollHz,
  });
  const connection = createConnection(config, source);

  let statusTimer: ReturnType<typeof setInterval> | null = null;
  let shuttingDown = false;

  const shutdown = async (reason: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`Shutting down (${reason})`);

    if (statusTimer) clearInterval(statusTimer);
    driver.stop();
    await connection.disconnect();

    const stats = source.getStats();
    log.info(
      `Lines: ${stats.linesSeen} seen, ${stats.linesRejected} rejected, ${stats.samplesDropped} dropped`,
    );
  };

  const requestShutdown = (reason: string) => {
    shutdown(reason).catch((error) => {
      log.error("Shutdown failed", error);
      process.exitCode = 1;
    });
  };

  connection.onStatus((status) => {
    log.info(`${connection.getDeviceName?.() ?? connection.type}: ${status}`);
    // Port unplugged or end of stdin: play out what is queued, then exit
    if (status === "disconnected" && driver.isRunning) {
      driver
        .finishWhenDrained()
        .then(() => requestShutdown("source disconnected"))
        .catch((error) => log.error("Drain failed", error));
    }
  });

  try {
    await connection.connect();
  } catch (error) {
    log.error("Could not open the sample source", error);
    process.exitCode = 1;
    return;
  }

  driver.start();

  statusTimer = setInterval(() => {
    const { x, y, orientation, acceptedSamples, rejectedSamples } =
      store.getState();
    const angles = orientation
      ? ` yaw=${orientation.yaw.toFixed(1)} pitch=${orientation.pitch.toFixed(1)} roll=${orientation.roll.toFixed(1)}`
      : "";
    log.info(
      `cursor=(${x.toFixed(1)}, ${y.toFixed(1)})${angles} samples=${acceptedSamples} rejected=${rejectedSamples}`,
    );
  }, config.statusIntervalMs);

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => requestShutdown(signal));
  }
}

main().catch((error) => {
  log.error("Fatal error", error);
  process.exitCode = 1;
});

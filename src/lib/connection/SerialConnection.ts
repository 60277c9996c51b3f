import { ReadlineParser, SerialPort } from "serialport";
import type { IConnection, ConnectionStatus } from "./IConnection";
import type { LineSampleSource } from "./LineSampleSource";
import { serialLog } from "../logger";

// IMU board CDC port as enumerated on Linux; override per machine.
export const DEFAULT_SERIAL_PATH = "/dev/ttyACM0";
export const DEFAULT_BAUD_RATE = 115200;

type ErrorCallback = (err: Error | null) => void;

/**
 * The slice of a serialport stream this connection drives.
 * SerialPort and SerialPortMock both satisfy it.
 */
export interface SerialPortHandle {
  readonly isOpen: boolean;
  open(callback: ErrorCallback): void;
  close(callback: ErrorCallback): void;
  flush(callback: ErrorCallback): void;
  pipe<T extends NodeJS.WritableStream>(destination: T): T;
  on(event: "close", listener: () => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
}

export interface SerialPortOptions {
  path: string;
  baudRate: number;
  autoOpen: false;
}

export type SerialPortFactory = (options: SerialPortOptions) => SerialPortHandle;

export interface SerialConnectionOptions {
  path?: string;
  baudRate?: number;
  /** Swap the port implementation (tests use the serialport mock binding) */
  portFactory?: SerialPortFactory;
}

const defaultPortFactory: SerialPortFactory = (options) =>
  new SerialPort(options);

function callbackToPromise(run: (cb: ErrorCallback) => void): Promise<void> {
  return new Promise((resolve, reject) => {
    run((err) => (err ? reject(err) : resolve()));
  });
}

/**
 * Line-oriented serial transport: every "\n"-terminated line read from the
 * port is handed to a LineSampleSource. The pipeline never sees the port.
 */
export class SerialConnection implements IConnection {
  type = "serial" as const;
  status: ConnectionStatus = "disconnected";

  private readonly path: string;
  private readonly baudRate: number;
  private readonly portFactory: SerialPortFactory;

  private port: SerialPortHandle | null = null;
  private _onStatus: ((status: ConnectionStatus) => void) | null = null;

  constructor(
    private readonly source: LineSampleSource,
    options: SerialConnectionOptions = {},
  ) {
    this.path = options.path ?? DEFAULT_SERIAL_PATH;
    this.baudRate = options.baudRate ?? DEFAULT_BAUD_RATE;
    this.portFactory = options.portFactory ?? defaultPortFactory;
  }

  onStatus(callback: (status: ConnectionStatus) => void) {
    this._onStatus = callback;
  }

  getDeviceName(): string | undefined {
    return this.path;
  }

  private setStatus(status: ConnectionStatus) {
    this.status = status;
    if (this._onStatus) this._onStatus(status);
  }

  async connect(): Promise<void> {
    // Never keep a stale port open across reconnects.
    if (this.port) {
      await this.disconnect();
    }

    this.setStatus("connecting");
    const port = this.portFactory({
      path: this.path,
      baudRate: this.baudRate,
      autoOpen: false,
    });

    try {
      await callbackToPromise((cb) => port.open(cb));
      // Start at a line boundary: drop whatever queued up before we opened
      await callbackToPromise((cb) => port.flush(cb));
    } catch (error) {
      serialLog.error(
        `Failed to open serial port ${this.path} at ${this.baudRate} baud`,
        error,
      );
      if (port.isOpen) {
        await callbackToPromise((cb) => port.close(cb)).catch((closeErr) =>
          serialLog.warn("Serial port close after failed open:", closeErr),
        );
      }
      this.setStatus("error");
      throw error instanceof Error ? error : new Error(String(error));
    }

    this.port = port;

    const lines = port.pipe(new ReadlineParser({ delimiter: "\n" }));
    lines.on("data", (line: string) => this.source.pushLine(line));

    port.on("error", (err: Error) => {
      serialLog.error("Serial port error:", err);
      if (this.port === port) this.setStatus("error");
    });

    port.on("close", () => {
      // Deliberate disconnect() has already detached this port
      if (this.port !== port) return;
      serialLog.warn(`Serial port ${this.path} closed unexpectedly`);
      this.port = null;
      this.setStatus("disconnected");
    });

    serialLog.info(`Serial port ${this.path} opened at ${this.baudRate} baud`);
    this.setStatus("connected");
  }

  async disconnect(): Promise<void> {
    const port = this.port;
    if (!port) return;
    this.port = null;

    try {
      if (port.isOpen) {
        await callbackToPromise((cb) => port.close(cb));
      }
      serialLog.info(`Closed serial port ${this.path}`);
    } catch (error) {
      serialLog.error(`Error closing serial port ${this.path}`, error);
    } finally {
      this.setStatus("disconnected");
    }
  }
}

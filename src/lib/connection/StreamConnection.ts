import type { Readable } from "node:stream";
import type { IConnection, ConnectionStatus } from "./IConnection";
import type { LineSampleSource } from "./LineSampleSource";
import { streamLog } from "../logger";

/**
 * Reads quaternion lines from any readable stream (stdin, a replayed
 * capture). The end of the stream reads as a disconnect.
 */
export class StreamConnection implements IConnection {
  type = "stream" as const;
  status: ConnectionStatus = "disconnected";

  private detach: (() => void) | null = null;
  private _onStatus: ((status: ConnectionStatus) => void) | null = null;

  constructor(
    private readonly source: LineSampleSource,
    private readonly input: Readable,
    private readonly name = "stdin",
  ) {}

  onStatus(callback: (status: ConnectionStatus) => void) {
    this._onStatus = callback;
  }

  getDeviceName(): string | undefined {
    return this.name;
  }

  private setStatus(status: ConnectionStatus) {
    this.status = status;
    if (this._onStatus) this._onStatus(status);
  }

  async connect(): Promise<void> {
    if (this.detach) return;

    this.setStatus("connecting");
    this.detach = this.source.attachStream(this.input);
    this.input.once("end", this.handleEnd);

    streamLog.info(`Reading samples from ${this.name}`);
    this.setStatus("connected");
  }

  async disconnect(): Promise<void> {
    const detach = this.detach;
    if (!detach) return;
    this.detach = null;

    this.input.off("end", this.handleEnd);
    detach();
    this.setStatus("disconnected");
  }

  private handleEnd = () => {
    if (!this.detach) return;
    streamLog.info(`End of input on ${this.name}`);
    this.detach = null;
    this.setStatus("disconnected");
  };
}

export type ConnectionStatus =
  | "disconnected"
  | "connecting"
  | "connected"
  | "error";

export interface IConnection {
  type: "serial" | "stream";
  status: ConnectionStatus;

  connect(): Promise<void>;
  disconnect(): Promise<void>;

  // Callbacks
  onStatus(callback: (status: ConnectionStatus) => void): void;

  getDeviceName?(): string | undefined;
}

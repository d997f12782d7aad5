/**
 * @file Link transport contract.
 * @description The connection supervisor is the only owner of a transport: it opens it,
 * writes through the send queue, and reacts to line, error and close callbacks.
 * @module link/transport
 */

export const DEFAULT_BAUD_RATE = 115200;

export interface TransportHandlers {
  /** One inbound line, terminator stripped */
  onLine(line: string): void;
  /** Transport-level fault after a successful open */
  onError(error: Error): void;
  /** Close that was not requested through {@link LinkTransport.close} */
  onClose(): void;
}

export interface LinkTransport {
  readonly path: string;
  readonly isOpen: boolean;
  /** Opens at 8N1 on the configured line rate. Rejects with a TransportError. */
  open(handlers: TransportHandlers): Promise<void>;
  /** Writes raw data; resolves once it has been handed to the OS. */
  write(data: string): Promise<void>;
  close(): Promise<void>;
}

export interface TransportOptions {
  path: string;
  baudRate: number;
}

export type TransportFactory = (options: TransportOptions) => LinkTransport;

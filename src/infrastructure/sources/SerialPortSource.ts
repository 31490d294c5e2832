import { StringDecoder } from 'node:string_decoder';
import { SerialPort } from 'serialport';
import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

/** The part of a `serialport` stream this source drives. `SerialPort` and `SerialPortMock` both fit. */
export interface SerialPortLike extends AsyncIterable<unknown> {
  readonly isOpen: boolean;
  open(callback: (error: Error | null) => void): void;
  close(callback: (error: Error | null) => void): void;
}

export interface SerialPortOpenOptions {
  readonly path: string;
  readonly baudRate: number;
  readonly autoOpen: false;
}

export interface SerialPortSourceOptions {
  /** Default: 115200. */
  readonly baudRate?: number;
  /** Decoding of received bytes. Default: 'ascii'. */
  readonly encoding?: 'ascii' | 'utf-8' | 'latin1';
  /** Port factory, e.g. to use `SerialPortMock`. Default: a real `SerialPort`. */
  readonly createPort?: (options: SerialPortOpenOptions) => SerialPortLike;
}

function openPort(port: SerialPortLike): Promise<void> {
  return new Promise((resolve, reject) => {
    port.open((error) => {
      if (error) reject(error);
      else resolve();
    });
  });
}

function closePort(port: SerialPortLike): Promise<void> {
  return new Promise((resolve, reject) => {
    port.close((error) => {
      if (error) reject(error);
      else resolve();
    });
  });
}

/**
 * Live data source reading from a serial device.
 *
 * The port is opened when reading starts and closed when reading ends.
 * Aborting the signal closes the port, which unblocks a pending read.
 */
export class SerialPortSource implements DataSource {
  private readonly baudRate: number;
  private readonly encoding: 'ascii' | 'utf-8' | 'latin1';
  private readonly createPort: (options: SerialPortOpenOptions) => SerialPortLike;

  constructor(
    private readonly path: string,
    options?: SerialPortSourceOptions,
  ) {
    this.baudRate = options?.baudRate ?? 115200;
    this.encoding = options?.encoding ?? 'ascii';
    this.createPort = options?.createPort ?? ((portOptions) => new SerialPort(portOptions));

    if (!Number.isInteger(this.baudRate) || this.baudRate < 1) {
      throw new Error('SerialPortSource: baudRate must be a positive integer');
    }
  }

  async *read(signal?: AbortSignal): AsyncIterable<string> {
    if (signal?.aborted) return;

    const port = this.createPort({ path: this.path, baudRate: this.baudRate, autoOpen: false });
    await openPort(port);

    let closing: Promise<Error | undefined> | undefined;
    const onAbort = (): void => {
      if (!port.isOpen) return;
      closing = closePort(port).then(
        () => undefined,
        (error: unknown) => (error instanceof Error ? error : new Error(String(error))),
      );
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    const decoder = new StringDecoder(this.encoding);
    try {
      for await (const chunk of port) {
        if (signal?.aborted) return;
        const text = Buffer.isBuffer(chunk) ? decoder.write(chunk) : String(chunk);
        if (text.length > 0) yield text;
      }
    } catch (error) {
      // Closing the port on abort ends the stream early.
      if (!signal?.aborted) throw error;
    } finally {
      signal?.removeEventListener('abort', onAbort);
      const closeError = closing ? await closing : undefined;
      if (port.isOpen) await closePort(port);
      if (closeError) throw closeError;
    }
  }

  metadata(): SourceMetadata {
    return { name: `${this.path}@${String(this.baudRate)}`, kind: 'live' };
  }
}

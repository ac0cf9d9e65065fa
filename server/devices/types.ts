// Re-export shared types
export * from '../../shared/types.js';

import type { Result } from '../../shared/types.js';

// Server-only types

/** A text query/response link to one instrument. */
export interface Transport {
  open(): Promise<Result<void, Error>>;
  close(): Promise<Result<void, Error>>;
  query(cmd: string): Promise<Result<string, Error>>;
  write(cmd: string): Promise<Result<void, Error>>;
  isOpen(): boolean;
}

/**
 * Discovery and transport creation for every address scheme the process knows.
 * createTransport does no I/O; the caller opens the returned transport.
 */
export interface InstrumentBus {
  listAddresses(): Promise<string[]>;
  createTransport(address: string): Result<Transport, Error>;
}

export type QueryFailureReason = 'timeout' | 'io' | 'closed';

export interface QueryFailure {
  reason: QueryFailureReason;
  message: string;
}

export interface SerialOptions {
  baudRate?: number;           // Default: 9600
  commandDelay?: number;       // ms delay after each command (default: 50)
  timeout?: number;            // Transport-level read timeout in ms (default: 5000)
}

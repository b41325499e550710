/**
 * Runtime Types
 *
 * Public types for VM configuration and operation results.
 * These types are the primary interface for host applications.
 */

import type { AnyLuaError } from '../../error-classes.js';
import type { VmState } from './session.js';
import type { LuaValue } from './values.js';

/** Standard libraries the guest runtime can open */
export type StandardLibrary =
  | 'base'
  | 'package'
  | 'coroutine'
  | 'table'
  | 'io'
  | 'os'
  | 'string'
  | 'utf8'
  | 'math'
  | 'debug';

export const STANDARD_LIBRARIES: readonly StandardLibrary[] = [
  'base',
  'package',
  'coroutine',
  'table',
  'io',
  'os',
  'string',
  'utf8',
  'math',
  'debug',
];

/** I/O callbacks for guest output */
export interface BridgeCallbacks {
  /** Called with each line the guest passes to print() */
  onLog: (line: string) => void;
}

/** Observability callbacks for monitoring host/guest traffic */
export interface ObservabilityCallbacks {
  /** Called before an exposed host function runs */
  onHostCall?: (event: HostCallEvent) => void;
  /** Called after an exposed host function returns */
  onHostReturn?: (event: HostReturnEvent) => void;
  /** Called when an operation reports a failure */
  onError?: (event: ErrorEvent) => void;
}

/** Event emitted before a host function runs */
export interface HostCallEvent {
  /** Name given at expose() time, or "anonymous" */
  name: string;
  args: LuaValue[];
}

/** Event emitted after a host function returns */
export interface HostReturnEvent {
  name: string;
  values: LuaValue[];
  durationMs: number;
}

/** Event emitted on a failed operation */
export interface ErrorEvent {
  error: AnyLuaError;
}

/** Options for init() */
export interface BridgeOptions {
  /** Libraries to open (default: all) */
  libraries?: 'all' | readonly StandardLibrary[];
  /** Assigned to package.path when set */
  packagePath?: string;
  /** I/O callbacks */
  callbacks?: Partial<BridgeCallbacks>;
  /** Observability callbacks */
  observability?: ObservabilityCallbacks;
}

// ============================================================
// OPERATION RESULTS
// ============================================================

/** Result of encoding a host value */
export interface Encoded {
  state: VmState;
  value: LuaValue;
}

/** Values produced by running or calling guest code, with the successor state */
export interface Returned {
  state: VmState;
  values: LuaValue[];
}

/**
 * Host function exposed to the guest.
 * Receives the current state and must return the state reflecting
 * everything it did. Throw to raise an error in the guest.
 */
export type HostFunction = (state: VmState, args: LuaValue[]) => Returned;

/** Options for expose() */
export interface ExposeOptions {
  /** Label used in observability events */
  name?: string;
}

/** Options for load() and run() */
export interface LoadOptions {
  /** Chunk name used in messages (default: the source text) */
  chunkName?: string;
}

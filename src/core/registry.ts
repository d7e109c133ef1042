/**
 * Connection registry and object references
 *
 * Arrays and reference values never own a transport. They hold a
 * `ConnectionHandle`, an index into a registry plus the generation of the
 * slot at the time it was handed out. Releasing a connection bumps the
 * generation, so every handle to it goes stale at once.
 */

import { StaleHandleError, MalformedDescriptorError } from '../errors.js';
import type { ObjectKind, ObjectRef } from '../types.js';

export interface ConnectionHandle {
  readonly slot: number;
  readonly generation: number;
}

export interface Closeable {
  close(): Promise<void> | void;
}

interface Slot<T> {
  value: T | undefined;
  generation: number;
}

export class ConnectionRegistry<T extends Closeable> {
  private _slots: Slot<T>[] = [];
  private _free: number[] = [];

  /**
   * Add a connection and get a handle on it
   */
  register(value: T): ConnectionHandle {
    const free = this._free.pop();
    if (free !== undefined) {
      const slot = this._slots[free];
      slot.value = value;
      return { slot: free, generation: slot.generation };
    }
    this._slots.push({ value, generation: 0 });
    return { slot: this._slots.length - 1, generation: 0 };
  }

  isLive(handle: ConnectionHandle): boolean {
    const slot = this._slots[handle.slot];
    return slot !== undefined && slot.value !== undefined && slot.generation === handle.generation;
  }

  /**
   * The connection behind a handle; throws `StaleHandleError` once it has
   * been released
   */
  resolve(handle: ConnectionHandle): T {
    const slot = this._slots[handle.slot];
    if (slot === undefined || slot.value === undefined || slot.generation !== handle.generation) {
      throw new StaleHandleError(
        `Connection handle ${handle.slot}/${handle.generation} is no longer valid`
      );
    }
    return slot.value;
  }

  /**
   * Close the connection and invalidate every handle to it
   */
  async release(handle: ConnectionHandle): Promise<void> {
    const value = this.resolve(handle);
    const slot = this._slots[handle.slot];
    slot.value = undefined;
    slot.generation++;
    this._free.push(handle.slot);
    await value.close();
  }

  get size(): number {
    return this._slots.length - this._free.length;
  }
}

const COLLECTIONS = new Map<string, ObjectKind>([
  ['groups', 'group'],
  ['datasets', 'dataset'],
  ['datatypes', 'datatype'],
]);

const PREFIXES = new Map<string, ObjectKind>([
  ['g', 'group'],
  ['d', 'dataset'],
  ['t', 'datatype'],
]);

/**
 * Resolve a reference string such as `datasets/d-1234` or a bare object id
 * such as `g-5678` to the object it names
 */
export function parseObjectRef(text: string): ObjectRef {
  const trimmed = text.replace(/^\/+/, '');
  const slash = trimmed.indexOf('/');
  if (slash !== -1) {
    const kind = COLLECTIONS.get(trimmed.slice(0, slash));
    const id = trimmed.slice(slash + 1);
    if (kind === undefined || id.length === 0 || id.includes('/')) {
      throw new MalformedDescriptorError(`Invalid object reference: ${text}`);
    }
    return { kind, id };
  }

  const kind = PREFIXES.get(trimmed.charAt(0));
  if (kind === undefined || trimmed.charAt(1) !== '-' || trimmed.length < 3) {
    throw new MalformedDescriptorError(`Invalid object reference: ${text}`);
  }
  return { kind, id: trimmed };
}

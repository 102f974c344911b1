/**
 * Process-wide device registry.
 *
 * Seeded once at startup and mutated only through `mutate()`, which runs
 * one device's read-modify-write synchronously and refuses re-entrant
 * mutation of the same device.  Devices are never removed.
 */

import type { Device, DeviceState, DeviceType } from '../types/device';
import { UnknownDeviceError } from '../directives/errors';
import { stateViolation } from './state-schema';

export interface RegistrySnapshot {
  /** Commit counter the snapshot was taken at */
  generation: number;
  devices: Device[];
}

/**
 * Outcome of a mutation callback.  `state` is the replacement state, or
 * undefined to leave the device untouched.
 */
export interface Mutation<R> {
  state?: DeviceState;
  result: R;
}

export interface DeviceStore {
  get(id: string): Device | undefined;
  has(id: string): boolean;
  list(type?: DeviceType): Device[];
  readonly size: number;
  readonly generation: number;
  /** Every device as of a single generation. */
  snapshot(): RegistrySnapshot;
  /** Atomically read and replace one device's state. Throws UnknownDeviceError. */
  mutate<R>(id: string, fn: (device: Device) => Mutation<R>): R;
}

export class InMemoryDeviceStore implements DeviceStore {
  private devices = new Map<string, Device>();
  private mutating = new Set<string>();
  private commits = 0;

  constructor(seed: Iterable<Device> = []) {
    for (const device of seed) {
      if (this.devices.has(device.id)) {
        throw new Error(`Duplicate device id in seed: ${device.id}`);
      }
      const violation = stateViolation(device.state);
      if (violation) {
        throw new Error(`Invalid seed state for ${device.id}: ${violation}`);
      }
      this.devices.set(device.id, device);
    }
  }

  get(id: string): Device | undefined {
    return this.devices.get(id);
  }

  has(id: string): boolean {
    return this.devices.has(id);
  }

  list(type?: DeviceType): Device[] {
    const all = Array.from(this.devices.values());
    if (!type) return all;
    return all.filter((d) => d.state.type === type);
  }

  get size(): number {
    return this.devices.size;
  }

  get generation(): number {
    return this.commits;
  }

  snapshot(): RegistrySnapshot {
    // Device records are replaced, never edited, so copying the current
    // values is enough to pin one generation.
    return { generation: this.commits, devices: Array.from(this.devices.values()) };
  }

  mutate<R>(id: string, fn: (device: Device) => Mutation<R>): R {
    const device = this.devices.get(id);
    if (!device) throw new UnknownDeviceError(id);
    if (this.mutating.has(id)) {
      throw new Error(`Re-entrant mutation of device ${id}`);
    }

    this.mutating.add(id);
    try {
      const { state, result } = fn(device);
      if (state && state !== device.state) {
        this.commit(device, state);
      }
      return result;
    } finally {
      this.mutating.delete(id);
    }
  }

  private commit(device: Device, state: DeviceState): void {
    if (state.type !== device.state.type) {
      throw new Error(
        `Cannot change device ${device.id} from ${device.state.type} to ${state.type}`,
      );
    }
    const violation = stateViolation(state);
    if (violation) {
      throw new Error(`Refusing invalid state for ${device.id}: ${violation}`);
    }
    this.devices.set(device.id, { ...device, state });
    this.commits++;
  }
}

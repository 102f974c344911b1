/**
 * Resolves (deviceId, namespace, name, instance) to the
 * handler registered for the target device's type.
 *
 * Resolution order: the device must exist (UnknownDeviceError), then the
 * (type, namespace, name) triple must be registered, then multi-instance
 * entries dispatch on the instance (UnsupportedCommandError otherwise).
 * There is no fallback across device types.
 */

import type { Device } from '../types/device';
import { deviceTypeOf } from '../types/device';
import type { InstanceName } from '../capabilities/catalog';
import { INSTANCES, instanceId } from '../capabilities/catalog';
import type { DeviceStore } from '../devices/device-store';
import { UnknownDeviceError, UnsupportedCommandError } from './errors';
import { buildHandlerTable, tableKey } from './handler-table';
import type { BoundHandler, HandlerTable } from './handler-table';

export type ResolvedHandler =
  | { kind: 'control'; handler: BoundHandler }
  | { kind: 'report' };

export interface RouteMatch {
  device: Device;
  handler: ResolvedHandler;
}

function isInstanceName(value: string): value is InstanceName {
  return Object.values<string>(INSTANCES).includes(value);
}

export class DirectiveRouter {
  constructor(
    private store: DeviceStore,
    private table: HandlerTable = buildHandlerTable(),
  ) {}

  route(deviceId: string, namespace: string, name: string, instance?: string): RouteMatch {
    const device = this.store.get(deviceId);
    if (!device) throw new UnknownDeviceError(deviceId);

    const unsupported = () => new UnsupportedCommandError(deviceId, namespace, name, instance);

    const entry = this.table.get(tableKey(deviceTypeOf(device), namespace, name));
    if (!entry) throw unsupported();

    switch (entry.kind) {
      case 'report':
        return { device, handler: { kind: 'report' } };
      case 'control':
        return { device, handler: { kind: 'control', handler: entry.handler } };
      case 'instanced': {
        const instanceName = this.resolveInstance(device, instance);
        const handler = instanceName ? entry.instances.get(instanceName) : undefined;
        if (!handler) throw unsupported();
        return { device, handler: { kind: 'control', handler } };
      }
    }
  }

  /** True when the device exists and the command is registered for its type. */
  supports(deviceId: string, namespace: string, name: string, instance?: string): boolean {
    try {
      this.route(deviceId, namespace, name, instance);
      return true;
    } catch (err) {
      if (err instanceof UnknownDeviceError || err instanceof UnsupportedCommandError) {
        return false;
      }
      throw err;
    }
  }

  /** `BrewStrength.coffee_maker_123` -> `BrewStrength`, if it names this device. */
  private resolveInstance(device: Device, instance?: string): InstanceName | undefined {
    if (!instance) return undefined;
    const dot = instance.indexOf('.');
    if (dot <= 0) return undefined;
    const name = instance.slice(0, dot);
    if (!isInstanceName(name)) return undefined;
    return instance === instanceId(name, device.id) ? name : undefined;
  }
}

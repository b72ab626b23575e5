// ─── Device Registry ────────────────────────────────────────────

/**
 * Lookup of provisioned devices. Only devices the registry knows may
 * hold a session.
 */
export interface DeviceRegistry {
  exists(deviceId: string): Promise<boolean>;
}

/**
 * Registry held in process memory. Used by the CLI and in tests; production
 * deployments supply their own `DeviceRegistry` backed by a database.
 */
export class InMemoryDeviceRegistry implements DeviceRegistry {
  private _devices: Set<string>;

  constructor(deviceIds: Iterable<string> = []) {
    this._devices = new Set(deviceIds);
  }

  get size(): number {
    return this._devices.size;
  }

  add(deviceId: string): void {
    this._devices.add(deviceId);
  }

  remove(deviceId: string): boolean {
    return this._devices.delete(deviceId);
  }

  list(): string[] {
    return [...this._devices];
  }

  async exists(deviceId: string): Promise<boolean> {
    return this._devices.has(deviceId);
  }
}

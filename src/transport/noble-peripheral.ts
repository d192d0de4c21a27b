/**
 * Noble-backed peripheral for Overdrive vehicles.
 *
 * Bridges noble's event-driven API to the polling Peripheral contract:
 * - Address-based scanning and connection
 * - Characteristic discovery with synthetic handles
 * - Notification buffering until the session polls
 */

import noble, {
  type Characteristic as NobleCharacteristic,
  type Peripheral as NobleDevice,
} from '@abandonware/noble';
import { LinkError } from '../exceptions';
import { SERVICE_UUID } from '../protocol/constants';
import { createLogger, type Logger } from '../utils/logger';
import { NotificationQueue } from './notification-queue';
import type { HandleRange, NotificationListener, Peripheral } from './peripheral';

export interface NoblePeripheralOptions {
  /**
   * Maximum time to scan for the vehicle's advertisement (default: 10000)
   */
  scanTimeoutMs?: number;

  /**
   * Maximum time to wait for the adapter to power on (default: 5000)
   */
  powerOnTimeoutMs?: number;

  /**
   * Maximum time for noble to establish the connection (default: 10000)
   */
  connectTimeoutMs?: number;

  logger?: Logger;
}

function normalizeUuid(uuid: string): string {
  return uuid.toLowerCase().replace(/-/g, '');
}

function normalizeAddress(address: string): string {
  return address.toLowerCase().replace(/[:-]/g, '');
}

/**
 * BLE peripheral implemented on @abandonware/noble.
 */
export class NoblePeripheral implements Peripheral {
  private readonly scanTimeoutMs: number;
  private readonly powerOnTimeoutMs: number;
  private readonly connectTimeoutMs: number;
  private readonly logger: Logger;

  private peripheral: NobleDevice | null = null;
  private characteristics = new Map<number, NobleCharacteristic>();
  private subscribed = new Set<number>();
  private notificationQueue = new NotificationQueue();
  private listener: NotificationListener | null = null;
  private linkLost = false;
  private disconnectHandler: (() => void) | null = null;

  constructor(options: NoblePeripheralOptions = {}) {
    this.scanTimeoutMs = options.scanTimeoutMs ?? 10000;
    this.powerOnTimeoutMs = options.powerOnTimeoutMs ?? 5000;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 10000;
    this.logger = options.logger ?? createLogger('noble');
  }

  /**
   * Check if the underlying peripheral reports a live connection.
   */
  get isConnected(): boolean {
    return this.peripheral?.state === 'connected' && !this.linkLost;
  }

  async connect(address: string): Promise<void> {
    await this.waitForPowerOn();

    const target = normalizeAddress(address);
    if (
      !this.peripheral ||
      (normalizeAddress(this.peripheral.address) !== target &&
        normalizeAddress(this.peripheral.id) !== target)
    ) {
      this.peripheral = await this.scanFor(target);
    }

    const peripheral = this.peripheral;
    this.resetLinkState();

    if (peripheral.state !== 'connected') {
      await new Promise<void>((resolve, reject) => {
        const timeout = setTimeout(() => {
          peripheral.cancelConnect();
          reject(
            new LinkError(`Connection to ${address} timed out after ${this.connectTimeoutMs}ms`)
          );
        }, this.connectTimeoutMs);

        peripheral.connect((error) => {
          clearTimeout(timeout);
          if (error) {
            reject(LinkError.from(error, `Failed to connect to ${address}`));
          } else {
            resolve();
          }
        });
      });
    }

    this.disconnectHandler = () => {
      this.logger.info(`Peripheral ${address} disconnected`);
      this.linkLost = true;
      this.notificationQueue.clear('Peripheral disconnected');
    };
    peripheral.once('disconnect', this.disconnectHandler);

    this.logger.info(`Connected to ${address}`);
  }

  async discoverCharacteristic(range: HandleRange, uuid: string): Promise<number> {
    if (this.characteristics.size === 0) {
      await this.discoverAll();
    }

    const wanted = normalizeUuid(uuid);
    for (const [handle, characteristic] of this.characteristics) {
      if (
        handle >= range.start &&
        handle <= range.end &&
        normalizeUuid(characteristic.uuid) === wanted
      ) {
        return handle;
      }
    }
    throw new LinkError(`Characteristic ${uuid} not found`);
  }

  async writeCharacteristic(handle: number, data: Uint8Array): Promise<void> {
    const characteristic = this.requireCharacteristic(handle);

    await new Promise<void>((resolve, reject) => {
      characteristic.write(Buffer.from(data), true, (error) => {
        if (error) {
          reject(LinkError.from(error, 'Failed to write characteristic'));
        } else {
          resolve();
        }
      });
    });
  }

  async subscribe(handle: number): Promise<void> {
    const characteristic = this.requireCharacteristic(handle);

    if (!this.subscribed.has(handle)) {
      characteristic.on('data', (data: Buffer) => {
        this.notificationQueue.enqueue({ handle, data: new Uint8Array(data) });
      });
      this.subscribed.add(handle);
    }

    await new Promise<void>((resolve, reject) => {
      characteristic.subscribe((error) => {
        if (error) {
          reject(LinkError.from(error, 'Failed to subscribe'));
        } else {
          resolve();
        }
      });
    });
  }

  setNotificationListener(listener: NotificationListener | null): void {
    this.listener = listener;
  }

  async waitForNotification(timeoutMs: number): Promise<boolean> {
    if (!this.isConnected) {
      throw new LinkError('Not connected to peripheral');
    }

    const entry = await this.notificationQueue.dequeue(timeoutMs);
    if (!entry) {
      return false;
    }
    this.listener?.(entry.handle, entry.data);
    return true;
  }

  async disconnect(): Promise<void> {
    const peripheral = this.peripheral;
    this.resetLinkState();
    // A link the vehicle already dropped never reports another disconnect
    if (!peripheral || peripheral.state === 'disconnected') {
      return;
    }

    await new Promise<void>((resolve) => {
      peripheral.disconnect(() => {
        resolve();
      });
    });
  }

  private requireCharacteristic(handle: number): NobleCharacteristic {
    const characteristic = this.characteristics.get(handle);
    if (!characteristic || !this.isConnected) {
      throw new LinkError(`Characteristic handle ${handle} is not available`);
    }
    return characteristic;
  }

  private resetLinkState(): void {
    if (this.peripheral && this.disconnectHandler) {
      this.peripheral.removeListener('disconnect', this.disconnectHandler);
      this.disconnectHandler = null;
    }
    this.notificationQueue.clear();
    this.characteristics.clear();
    this.subscribed.clear();
    this.linkLost = false;
  }

  private discoverAll(): Promise<void> {
    const peripheral = this.peripheral;
    if (!peripheral) {
      return Promise.reject(new LinkError('No peripheral connected'));
    }

    return new Promise((resolve, reject) => {
      peripheral.discoverAllServicesAndCharacteristics((error, _services, characteristics) => {
        if (error) {
          reject(LinkError.from(error, 'Service discovery failed'));
          return;
        }
        // noble hides ATT handles; number characteristics in discovery order
        (characteristics ?? []).forEach((characteristic, index) => {
          this.characteristics.set(index + 1, characteristic);
        });
        resolve();
      });
    });
  }

  private waitForPowerOn(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (noble._state === 'poweredOn') {
        resolve();
        return;
      }

      const timeout = setTimeout(() => {
        noble.removeListener('stateChange', onStateChange);
        reject(new LinkError('Bluetooth adapter did not power on'));
      }, this.powerOnTimeoutMs);

      const onStateChange = (state: string) => {
        if (state === 'poweredOn') {
          clearTimeout(timeout);
          noble.removeListener('stateChange', onStateChange);
          resolve();
        }
      };

      noble.on('stateChange', onStateChange);
    });
  }

  private scanFor(target: string): Promise<NobleDevice> {
    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        noble.stopScanning();
        noble.removeListener('discover', onDiscover);
        reject(new LinkError(`Vehicle ${target} not found within ${this.scanTimeoutMs}ms`));
      }, this.scanTimeoutMs);

      const onDiscover = (peripheral: NobleDevice) => {
        if (
          normalizeAddress(peripheral.address) !== target &&
          normalizeAddress(peripheral.id) !== target
        ) {
          return;
        }

        clearTimeout(timeout);
        noble.stopScanning();
        noble.removeListener('discover', onDiscover);
        this.logger.debug(`Discovered ${peripheral.address || peripheral.id}`);
        resolve(peripheral);
      };

      noble.on('discover', onDiscover);
      noble.startScanning([normalizeUuid(SERVICE_UUID)], false);
    });
  }
}

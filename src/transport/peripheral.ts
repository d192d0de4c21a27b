/**
 * Transport capability consumed by the session.
 *
 * Implementations wrap a BLE stack. None of the methods are safe to call
 * concurrently; the session serializes every call through one owner.
 */

/**
 * Inclusive attribute handle range searched during discovery.
 */
export interface HandleRange {
  start: number;
  end: number;
}

export type NotificationListener = (handle: number, data: Uint8Array) => void;

export interface Peripheral {
  /**
   * @throws {LinkError} If the link cannot be established
   */
  connect(address: string): Promise<void>;

  /**
   * Find a characteristic by UUID.
   *
   * @returns Handle used for subsequent writes and subscriptions
   * @throws {LinkError} If the characteristic is absent
   */
  discoverCharacteristic(range: HandleRange, uuid: string): Promise<number>;

  /**
   * @throws {LinkError} If the write fails
   */
  writeCharacteristic(handle: number, data: Uint8Array): Promise<void>;

  /**
   * Enable notifications on a characteristic.
   *
   * @throws {LinkError} If the subscription fails
   */
  subscribe(handle: number): Promise<void>;

  /**
   * Replace the listener receiving notifications. The listener is only
   * invoked from within waitForNotification().
   */
  setNotificationListener(listener: NotificationListener | null): void;

  /**
   * Wait for at most one notification and hand it to the listener.
   *
   * @returns True if a notification was delivered before the timeout
   * @throws {LinkError} On transport fault
   */
  waitForNotification(timeoutMs: number): Promise<boolean>;

  /**
   * Drop the link. Best effort.
   */
  disconnect(): Promise<void>;
}

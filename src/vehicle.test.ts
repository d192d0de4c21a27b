import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConnectionAbortedError, InvalidCommandError } from './exceptions';
import { ConnectionState } from './models/enums';
import { WRITE_CHARACTERISTIC_UUID } from './protocol/constants';
import { FakePeripheral } from './testing/fake-peripheral';
import { RecordingLogger } from './testing/recording-logger';
import { Vehicle, type VehicleOptions } from './vehicle';

const ADDRESS = 'e6:d8:52:f1:d9:43';
const SDK_MODE = '03 90 01 01';
const PING = '01 16';
const DISCONNECT = '01 0d';
const LANE_RESET = '05 2c 00 00 00 00';

// location=5 piece=33 offset=0 speed=600 clockwise
const LOCATION = [0x0a, 0x27, 0x05, 0x21, 0x00, 0x00, 0x00, 0x00, 0x58, 0x02, 0x47];
// piece=17 previous=33 offset=0 direction=1
const TRANSITION = [0x08, 0x29, 0x11, 0x21, 0x00, 0x00, 0x00, 0x00, 0x01];

const vehicles: Vehicle[] = [];

function createVehicle(overrides: Partial<VehicleOptions> = {}) {
  const peripheral = new FakePeripheral();
  const logger = new RecordingLogger();
  const vehicle = new Vehicle(ADDRESS, {
    peripheral,
    logger,
    handshakeTimeoutMs: 20,
    reconnectDelayMs: 0,
    ...overrides,
  });
  vehicles.push(vehicle);
  return { vehicle, peripheral, logger };
}

async function connected(overrides: Partial<VehicleOptions> = {}) {
  const created = createVehicle(overrides);
  await created.vehicle.connect();
  created.peripheral.clearWrites();
  return created;
}

afterEach(async () => {
  await Promise.all(vehicles.splice(0).map((v) => v.disconnect()));
});

describe('Vehicle', () => {
  describe('construction', () => {
    it('starts disconnected without touching the transport', () => {
      const { vehicle, peripheral } = createVehicle();

      expect(vehicle.address).toBe(ADDRESS);
      expect(vehicle.state).toBe(ConnectionState.DISCONNECTED);
      expect(vehicle.isConnected).toBe(false);
      expect(peripheral.connectedAddresses).toEqual([]);
    });

    it.each([
      { pollIntervalMs: 0 },
      { pollIntervalMs: Number.NaN },
      { handshakeTimeoutMs: -1 },
      { reconnectDelayMs: -5 },
      { reconnectDelayMs: Number.POSITIVE_INFINITY },
      { maxConcurrentCallbacks: 0 },
      { maxConcurrentCallbacks: 1.5 },
    ])('rejects options %o', (options) => {
      expect(() => createVehicle(options)).toThrow(RangeError);
    });
  });

  describe('connect', () => {
    it('performs the handshake and starts delivering', async () => {
      const { vehicle, peripheral } = createVehicle();

      await vehicle.connect();

      expect(peripheral.connectedAddresses).toEqual([ADDRESS]);
      expect(peripheral.writtenFrames()).toEqual([SDK_MODE, PING]);
      expect(peripheral.subscribeCalls).toBe(1);
      expect(vehicle.state).toBe(ConnectionState.CONNECTED);
      expect(vehicle.isConnected).toBe(true);
    });

    it('retries until the vehicle is reachable', async () => {
      const { vehicle, peripheral, logger } = createVehicle();
      peripheral.failNextConnects(2);

      await vehicle.connect();

      expect(peripheral.connectedAddresses).toEqual([ADDRESS]);
      expect(logger.messages('error')).toEqual([
        `Connect to ${ADDRESS} failed`,
        `Connect to ${ADDRESS} failed`,
      ]);
    });

    it('retries when a characteristic is missing', async () => {
      const { vehicle, peripheral, logger } = createVehicle();
      peripheral.hideCharacteristic(WRITE_CHARACTERISTIC_UUID);

      const connecting = vehicle.connect();
      await vi.waitFor(() => expect(logger.messages('error').length).toBeGreaterThan(0));
      peripheral.showCharacteristic(WRITE_CHARACTERISTIC_UUID);
      await connecting;

      expect(vehicle.isConnected).toBe(true);
    });

    it('repeats the subscribe step until a notification arrives', async () => {
      const { vehicle, peripheral, logger } = createVehicle();
      peripheral.respondToPing = false;

      const connecting = vehicle.connect();
      await vi.waitFor(() => expect(logger.messages('error')).toContain('Set notify failed'));
      peripheral.respondToPing = true;
      await connecting;

      expect(peripheral.subscribeCalls).toBeGreaterThanOrEqual(2);
      expect(peripheral.connectedAddresses).toEqual([ADDRESS]);
      expect(vehicle.isConnected).toBe(true);
    });

    it('shares one attempt between concurrent callers', async () => {
      const { vehicle, peripheral } = createVehicle();

      const first = vehicle.connect();
      const second = vehicle.connect();

      expect(second).toBe(first);
      await first;
      await vehicle.connect();
      expect(peripheral.connectedAddresses).toEqual([ADDRESS]);
    });

    it('is aborted by disconnect()', async () => {
      const { vehicle, peripheral, logger } = createVehicle();
      peripheral.failNextConnects(1_000_000);

      const outcome = vehicle.connect().then(
        () => null,
        (error: unknown) => error
      );
      await vi.waitFor(() => expect(logger.messages('error').length).toBeGreaterThan(0));
      await vehicle.disconnect();

      const error = await outcome;
      expect(error).toBeInstanceOf(ConnectionAbortedError);
      expect(error).toMatchObject({ address: ADDRESS, phase: 'connect' });
      expect(vehicle.state).toBe(ConnectionState.DISCONNECTED);
    });
  });

  describe('commands', () => {
    it('writes the set speed frame', async () => {
      const { vehicle, peripheral } = await connected();

      vehicle.changeSpeed(500, 1000);

      await vi.waitFor(() => expect(peripheral.writtenFrames()).toEqual(['06 24 f4 01 e8 03 01']));
      expect(vehicle.speed).toBe(500);
    });

    it('writes a lane reset before a right lane change', async () => {
      const { vehicle, peripheral } = await connected();

      vehicle.changeLaneRight(1000, 1000);

      await vi.waitFor(() =>
        expect(peripheral.writtenFrames()).toEqual([LANE_RESET, '09 25 e8 03 e8 03 00 00 32 42'])
      );
    });

    it('writes a lane reset before a left lane change', async () => {
      const { vehicle, peripheral } = await connected();

      vehicle.changeLaneLeft(300, 500);

      await vi.waitFor(() =>
        expect(peripheral.writtenFrames()).toEqual([LANE_RESET, '09 25 2c 01 f4 01 00 00 32 c2'])
      );
    });

    it('writes lane offset, ping and raw commands in order', async () => {
      const { vehicle, peripheral } = await connected();

      vehicle.setLane(-10.25);
      vehicle.ping();
      vehicle.sendCommand(Uint8Array.of(0x33, 0x01));
      vehicle.changeLane(100, 200, 0);

      await vi.waitFor(() =>
        expect(peripheral.writtenFrames()).toEqual([
          '05 2c 00 00 24 c1',
          PING,
          '02 33 01',
          LANE_RESET,
          '09 25 64 00 c8 00 00 00 00 00',
        ])
      );
    });

    it('rejects invalid arguments without queueing anything', async () => {
      const { vehicle } = createVehicle();

      expect(() => vehicle.changeSpeed(1001, 0)).toThrow(InvalidCommandError);
      expect(() => vehicle.changeLane(100, 100, Number.NaN)).toThrow(InvalidCommandError);
      expect(() => vehicle.changeLaneLeft(100, -1)).toThrow(InvalidCommandError);
      expect(() => vehicle.sendCommand(new Uint8Array(0))).toThrow(InvalidCommandError);
      expect(vehicle.pendingCommands).toBe(0);
      expect(vehicle.speed).toBe(0);
    });

    it('delivers commands queued before connecting', async () => {
      const { vehicle, peripheral } = createVehicle();
      vehicle.changeSpeed(100, 200);
      expect(vehicle.pendingCommands).toBe(1);

      await vehicle.connect();

      await vi.waitFor(() =>
        expect(peripheral.writtenFrames()).toEqual([SDK_MODE, PING, '06 24 64 00 c8 00 01'])
      );
      expect(vehicle.pendingCommands).toBe(0);
    });
  });

  describe('notifications', () => {
    it('reports location updates and caches them', async () => {
      const { vehicle, peripheral } = await connected();
      const callback = vi.fn();
      vehicle.setLocationChangeCallback(callback);

      peripheral.notify(LOCATION);

      await vi.waitFor(() => expect(callback).toHaveBeenCalledWith(ADDRESS, 5, 33, 600, true));
      expect(vehicle.location).toBe(5);
      expect(vehicle.piece).toBe(33);
      expect(vehicle.speed).toBe(600);
      expect(vehicle.clockwise).toBe(true);
    });

    it('reports transitions', async () => {
      const { vehicle, peripheral } = await connected();
      const callback = vi.fn();
      vehicle.setTransitionCallback(callback);

      peripheral.notify(TRANSITION);

      await vi.waitFor(() => expect(callback).toHaveBeenCalledWith(ADDRESS, 17, 33, 0, 1));
      expect(vehicle.piece).toBe(17);
    });

    it('answers ping with a pong callback', async () => {
      const { vehicle } = await connected();
      const callback = vi.fn();
      vehicle.setPongCallback(callback);

      vehicle.ping();

      await vi.waitFor(() => expect(callback).toHaveBeenCalledWith(ADDRESS));
    });

    it('ignores unknown notification ids', async () => {
      const { vehicle, peripheral, logger } = await connected();
      const location = vi.fn();
      const transition = vi.fn();
      const pong = vi.fn();
      vehicle.setLocationChangeCallback(location);
      vehicle.setTransitionCallback(transition);
      vehicle.setPongCallback(pong);

      peripheral.notify([0x01, 0xff]);
      peripheral.notify([0x01, 0x17]);

      await vi.waitFor(() => expect(pong).toHaveBeenCalledTimes(1));
      expect(location).not.toHaveBeenCalled();
      expect(transition).not.toHaveBeenCalled();
      expect(logger.messages('error')).toEqual([]);
      expect(vehicle.isConnected).toBe(true);
    });

    it('keeps delivering after a callback throws', async () => {
      const { vehicle, peripheral, logger } = await connected();
      vehicle.setLocationChangeCallback(() => {
        throw new Error('callback bug');
      });

      peripheral.notify(LOCATION);
      await vi.waitFor(() => expect(logger.messages('error')).toEqual(['location callback failed']));
      vehicle.changeSpeed(500, 1000);

      await vi.waitFor(() => expect(peripheral.writtenFrames()).toEqual(['06 24 f4 01 e8 03 01']));
      expect(vehicle.isConnected).toBe(true);
    });

    it('stops calling a cleared callback', async () => {
      const { vehicle, peripheral } = await connected();
      const first = vi.fn();
      const second = vi.fn();
      const location = vi.fn();
      vehicle.setPongCallback(first);
      vehicle.setPongCallback(null);
      vehicle.setPongCallback(second);
      vehicle.setPongCallback(null);
      vehicle.setLocationChangeCallback(location);

      vehicle.ping();
      await vi.waitFor(() => expect(peripheral.writtenFrames()).toEqual([PING]));
      peripheral.notify(LOCATION);

      // the pong is queued ahead of the location update
      await vi.waitFor(() => expect(location).toHaveBeenCalledTimes(1));
      expect(first).not.toHaveBeenCalled();
      expect(second).not.toHaveBeenCalled();
    });
  });

  describe('link failures', () => {
    it('reconnects and redelivers the failed frame', async () => {
      const { vehicle, peripheral } = await connected();
      const states: ConnectionState[] = [];
      vehicle.setStateChangeCallback((_address, state) => {
        states.push(state);
      });
      peripheral.failNextWrites(1);

      vehicle.changeSpeed(500, 1000);
      vehicle.ping();

      await vi.waitFor(() =>
        expect(peripheral.writtenFrames()).toEqual([SDK_MODE, PING, '06 24 f4 01 e8 03 01', PING])
      );
      await vi.waitFor(() =>
        expect(states).toEqual([ConnectionState.RECONNECTING, ConnectionState.CONNECTED])
      );
      expect(vehicle.isConnected).toBe(true);
    });

    it('reconnects after the notification poll fails', async () => {
      const { vehicle, peripheral, logger } = await connected();

      peripheral.failNextPolls(1);

      await vi.waitFor(() => expect(peripheral.connectedAddresses).toEqual([ADDRESS, ADDRESS]));
      await vi.waitFor(() => expect(vehicle.state).toBe(ConnectionState.CONNECTED));
      expect(logger.messages('error')).toEqual([`Link to ${ADDRESS} lost`]);
    });
  });

  describe('disconnect', () => {
    it('lets the worker send the disconnect frame and close the link', async () => {
      const { vehicle, peripheral } = await connected();
      const states: ConnectionState[] = [];
      vehicle.setStateChangeCallback((_address, state, previous) => {
        states.push(previous, state);
      });

      await vehicle.disconnect();

      expect(peripheral.writtenFrames()).toEqual([DISCONNECT]);
      expect(peripheral.disconnectCalls).toBe(1);
      expect(vehicle.state).toBe(ConnectionState.DISCONNECTED);
      await vi.waitFor(() =>
        expect(states).toEqual([ConnectionState.CONNECTED, ConnectionState.DISCONNECTED])
      );
    });

    it('stays disconnected when a connect queued behind teardown is cancelled', async () => {
      const { vehicle, peripheral } = await connected();

      const first = vehicle.disconnect();
      const reconnect = vehicle.connect().then(
        () => null,
        (error: unknown) => error
      );
      const second = vehicle.disconnect();
      await Promise.all([first, second]);

      expect(await reconnect).toBeInstanceOf(ConnectionAbortedError);
      expect(vehicle.state).toBe(ConnectionState.DISCONNECTED);
      expect(peripheral.connectedAddresses).toEqual([ADDRESS]);
      expect(peripheral.writtenFrames()).toEqual([DISCONNECT]);
    });

    it('does nothing when never connected', async () => {
      const { vehicle, peripheral } = createVehicle();

      await vehicle.disconnect();

      expect(peripheral.disconnectCalls).toBe(0);
      expect(vehicle.state).toBe(ConnectionState.DISCONNECTED);
    });

    it('logs teardown failures instead of throwing', async () => {
      const { vehicle, peripheral, logger } = await connected();
      peripheral.failNextDisconnect();

      await expect(vehicle.disconnect()).resolves.toBeUndefined();

      expect(logger.messages('error')).toEqual([`Disconnect from ${ADDRESS} failed`]);
    });

    it('can connect again and deliver commands queued while disconnected', async () => {
      const { vehicle, peripheral } = await connected();
      await vehicle.disconnect();
      vehicle.changeSpeed(100, 200);

      await vehicle.connect();

      await vi.waitFor(() =>
        expect(peripheral.writtenFrames()).toEqual([
          DISCONNECT,
          SDK_MODE,
          PING,
          '06 24 64 00 c8 00 01',
        ])
      );
      expect(peripheral.connectedAddresses).toEqual([ADDRESS, ADDRESS]);
      expect(vehicle.isConnected).toBe(true);
    });
  });
});

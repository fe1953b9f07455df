import { describe, expect, it } from 'vitest';
import { LauncherError } from './launcherErrors.js';
import { reservePort } from './port.js';

describe('reservePort', () => {
  it('picks a free port when asked for port 0', async () => {
    const reservation = await reservePort(0, '127.0.0.1');

    expect(reservation.port).toBeGreaterThan(0);

    await reservation.release();
  });

  it('holds the port until released', async () => {
    const reservation = await reservePort(0, '127.0.0.1');

    await expect(reservePort(reservation.port, '127.0.0.1')).rejects.toBeInstanceOf(LauncherError);

    await expect(reservation.release()).resolves.toBe(reservation.port);

    const again = await reservePort(reservation.port, '127.0.0.1');
    expect(again.port).toBe(reservation.port);
    await again.release();
  });

  it('releases only once', async () => {
    const reservation = await reservePort(0, '127.0.0.1');

    const first = reservation.release();
    const second = reservation.release();

    expect(second).toBe(first);
    await expect(second).resolves.toBe(reservation.port);
  });
});

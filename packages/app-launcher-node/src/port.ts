import { createServer } from 'node:net';
import { LauncherError } from './launcherErrors.js';

export interface PortReservation {
  readonly port: number;
  /** Closes the placeholder socket so the runner can bind. Resolves to the released port. */
  release(): Promise<number>;
}

/**
 * Holds a TCP port open until the server that will use it starts.
 * Port `0` asks the OS for a free one.
 */
export async function reservePort(port = 0, host?: string): Promise<PortReservation> {
  const server = createServer();

  try {
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen({ port, host, exclusive: true }, () => {
        server.off('error', reject);
        resolve();
      });
    });
  } catch (error) {
    throw new LauncherError(`Cannot reserve port ${port}${host ? ` on ${host}` : ''}`, error);
  }

  const address = server.address();
  if (address === null || typeof address === 'string') {
    server.close();
    throw new LauncherError(`Reserved socket has no TCP address: ${String(address)}`);
  }

  const reservedPort = address.port;
  let released: Promise<number> | undefined;

  return {
    port: reservedPort,
    release() {
      released ??= new Promise<number>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve(reservedPort)));
      });
      return released;
    },
  };
}

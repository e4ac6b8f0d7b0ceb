import { createServer, type Server } from 'net';

/**
 * Check if a port can be bound on the given host.
 * The probe socket is closed before this resolves.
 */
export function isPortAvailable(host: string, port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const server: Server = createServer();

    server.once('error', () => resolve(false));

    server.once('listening', () => {
      server.close(() => resolve(true));
    });

    server.listen(port, host);
  });
}

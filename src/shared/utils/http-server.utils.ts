/**
 * Promise wrappers around http.Server listen/close
 */

import { Server, createServer, RequestListener } from 'http';
import { AddressInfo } from 'net';

export interface ListeningServer {
  server: Server;
  port: number;
}

/**
 * Bind a request listener (an Express app) and resolve once it accepts connections.
 * Port 0 picks a free port; the bound one is returned.
 */
export function listen(handler: RequestListener, port: number, host: string): Promise<ListeningServer> {
  const server = createServer(handler);

  return new Promise<ListeningServer>((resolve, reject) => {
    const onError = (error: Error) => reject(error);
    server.once('error', onError);
    server.listen(port, host, () => {
      server.off('error', onError);
      resolve({ server, port: boundPort(server) });
    });
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
  });
}

function boundPort(server: Server): number {
  const address: string | AddressInfo | null = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error(`Server is not bound to a TCP port (${String(address)})`);
  }
  return address.port;
}

import * as http from 'node:http';

export interface LoopbackServer {
  server: http.Server;
  port: number;
  baseUrl: string;
  close(): Promise<void>;
}

/**
 * @hebrew מפעיל שרת HTTP על 127.0.0.1 בפורט אקראי. משמש את הבדיקות כתחליף להתקנים אמיתיים.
 * @param handler - אפליקציית express או כל RequestListener.
 */
export function startLoopbackServer(handler: http.RequestListener): Promise<LoopbackServer> {
  return new Promise<LoopbackServer>((resolve, reject) => {
    const server = http.createServer(handler);
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Loopback server has no TCP address'));
        return;
      }
      resolve({
        server,
        port: address.port,
        baseUrl: `http://127.0.0.1:${address.port}`,
        close: () => new Promise<void>((resolveClose, rejectClose) => {
          server.closeAllConnections();
          server.close(err => (err ? rejectClose(err) : resolveClose()));
        }),
      });
    });
  });
}

import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';

export interface Route {
  status?: number;
  contentType?: string;
  body: string;
}

export interface TestServer {
  baseUrl: string;
  hits: string[];
  close(): Promise<void>;
}

export async function startServer(routes: Record<string, Route>): Promise<TestServer> {
  const hits: string[] = [];
  const server = createServer((req: IncomingMessage, res: ServerResponse) => {
    const path = new URL(req.url ?? '/', `http://${req.headers.host ?? ''}`).pathname;
    hits.push(path);
    const route = routes[path];

    if (!route) {
      res.statusCode = 404;
      res.end('Not found');
      return;
    }

    res.statusCode = route.status ?? 200;
    res.setHeader('Content-Type', route.contentType ?? 'text/html; charset=utf-8');
    res.end(route.body);
  });

  await new Promise<void>((resolve) => {
    server.listen(0, '127.0.0.1', () => resolve());
  });

  const address = server.address();
  if (typeof address !== 'object' || !address || typeof address.port !== 'number') {
    throw new Error('Unable to determine server address for tests.');
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    hits,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error?: Error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      }),
  };
}

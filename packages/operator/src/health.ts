import { createServer, type Server } from 'node:http';

/**
 * Start a minimal HTTP health server for Kubernetes liveness and readiness probes.
 *
 * /healthz always answers 200 "ok". /readyz answers 200 "ok" once `isReady`
 * returns true and 503 "not ready" before that. Everything else is 404.
 */
export function startHealthServer(port = 8080, isReady: () => boolean = () => true): Server {
  const server = createServer((req, res) => {
    if (req.url === '/healthz') {
      res.writeHead(200);
      res.end('ok');
    } else if (req.url === '/readyz') {
      if (isReady()) {
        res.writeHead(200);
        res.end('ok');
      } else {
        res.writeHead(503);
        res.end('not ready');
      }
    } else {
      res.writeHead(404);
      res.end();
    }
  });
  server.listen(port);
  return server;
}

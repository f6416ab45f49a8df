import express, { Request } from 'express';
import { logger } from '../shared/logger';
import { requestLog } from './requestLog';

/**
 * Stand-in backend service. Echoes what it received so tests can check that
 * the gateway forwarded a request unchanged, and offers a few routes that
 * exercise streaming, slowness and downstream cookies.
 */
const app = express();

function readRawBody(req: Request): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf8')));
    req.on('error', reject);
  });
}

// Test-only control endpoints live under a prefix no registered resource uses
app.get('/__requests', (_req, res) => {
  res.json({ count: requestLog.count(), requests: requestLog.all() });
});

app.post('/__requests/reset', (_req, res) => {
  requestLog.reset();
  res.json({ reset: true });
});

app.get('/slow', (req, res) => {
  const delay = Number(req.query.ms ?? 500);
  requestLog.record({ method: req.method, url: req.originalUrl, headers: req.headers, body: '' });
  const timer = setTimeout(() => res.json({ slow: true }), delay);
  res.on('close', () => clearTimeout(timer));
});

app.get('/stream', (req, res) => {
  requestLog.record({ method: req.method, url: req.originalUrl, headers: req.headers, body: '' });
  res.status(200).setHeader('Content-Type', 'text/plain');
  let sent = 0;
  const timer = setInterval(() => {
    sent++;
    res.write(`chunk-${sent}\n`);
    if (sent === 3) {
      clearInterval(timer);
      res.end();
    }
  }, 10);
  res.on('close', () => clearInterval(timer));
});

app.get('/set-cookie', (req, res) => {
  requestLog.record({ method: req.method, url: req.originalUrl, headers: req.headers, body: '' });
  res.cookie('downstream_pref', 'dark');
  res.json({ ok: true });
});

app.get('/status/:code', (req, res) => {
  requestLog.record({ method: req.method, url: req.originalUrl, headers: req.headers, body: '' });
  res.status(Number(req.params.code)).json({ status: Number(req.params.code) });
});

app.all('*', (req, res, next) => {
  readRawBody(req)
    .then(body => {
      requestLog.record({ method: req.method, url: req.originalUrl, headers: req.headers, body });
      res.status(200).setHeader('X-Downstream', 'echo');
      res.json({ method: req.method, url: req.originalUrl, body });
    })
    .catch(next);
});

// Start server if run directly
if (require.main === module) {
  const port = Number(process.env.PORT || 3001);
  app.listen(port, () => {
    logger.info(`Downstream echo service listening on port ${port}`);
  });
}

export { app };

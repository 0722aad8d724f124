import { serve } from '@hono/node-server';
import { createStubApp } from './index.js';

export function startStubServer(opts: { port: number; host: string }): void {
  const app = createStubApp();

  serve({
    fetch: app.fetch,
    port: opts.port,
    hostname: opts.host,
  }, (info) => {
    const displayHost = opts.host === '0.0.0.0' ? 'localhost' : opts.host;
    console.log(`[snippet-assist] Stub assistant listening on http://${displayHost}:${info.port}`);
  });
}

import { createApp } from './app.js';
import { loadConfig } from './config.js';

const config = loadConfig();
const app = await createApp({ config });

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    console.log(`[Server] ${signal} received, closing`);
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('[Server] Failed to close cleanly:', err);
        process.exit(1);
      }
    );
  });
}

app.listen({ port: config.port, host: config.host }, (err, address) => {
  if (err) {
    console.error('[Server] Failed to start:', err);
    process.exit(1);
  }
  console.log(`[Server] listening on ${address}`);
});

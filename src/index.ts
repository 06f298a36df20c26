// Support orchestration API
// Port: 3838 (localhost only)

// Load environment variables from .env file
import 'dotenv/config';

import { buildApp } from './app.js';
import { createStore } from './db.js';
import { env, logConfiguration } from './env.js';

const PORT = env.PORT;
const HOST = env.HOST;

const store = await createStore();
const { server } = await buildApp({ store });

// Start server
try {
  await server.listen({ port: PORT, host: HOST });
  console.log(`🛟 Support API listening on http://${HOST}:${PORT}`);
  console.log(`📊 Health: http://${HOST}:${PORT}/v1/health`);
  console.log('');
  logConfiguration();
} catch (err) {
  server.log.error(err);
  process.exit(1);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        server.log.error(err);
        process.exit(1);
      }
    );
  });
}

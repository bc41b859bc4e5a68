import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createStoreRegistry } from './stores.js';

const config = loadConfig();
const registry = createStoreRegistry(config.dataDir);
const app = createApp(registry, config.defaultUser);

const server = app.listen(config.port, () => {
  console.log(`API server running on http://localhost:${config.port} (data in ${config.dataDir})`);
});

function shutdown(): void {
  server.close(() => {
    registry.closeAll();
    process.exit(0);
  });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

export default app;

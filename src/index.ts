import { buildServer } from './api/server.js';
import { loadConfig } from './config/index.js';
import { getLogger } from './utils/logging.js';

async function main() {
  const cfg = loadConfig();
  const server = await buildServer({ config: cfg });
  const port = Number(process.env.PORT || 3000);
  await server.listen({ port, host: process.env.HOST || '127.0.0.1' });
  getLogger().info({ port, region: cfg.aws.region ?? 'default chain' }, 'Server started');
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});

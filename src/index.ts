import 'dotenv/config';
import { GovernanceServer } from './api/server';
import { loadSecrets } from './config/load-secrets';
import { loadGovernanceConfig, resolveRepositoryRoot } from './config/load-config';
import { createPipeline } from './bootstrap';
import { initMetrics, initTelemetry, shutdownTelemetry } from './observability';

/**
 * Main entry point for the governance API server
 */
async function main() {
  console.log('Starting governance pipeline...');

  // Secrets Manager fills DATABASE_URL when a secret name is configured
  await loadSecrets();

  initTelemetry();
  initMetrics();

  const repositoryRoot = resolveRepositoryRoot();
  const config = loadGovernanceConfig(repositoryRoot);
  console.log(`Governing repository ${config.repositoryRoot} (${config.tiers.length} tier rule(s))`);

  const pipeline = await createPipeline(config, { databaseUrl: process.env.DATABASE_URL });

  const server = new GovernanceServer({
    store: pipeline.store,
    service: pipeline.service,
    gate: pipeline.gate,
    applier: pipeline.applier,
  });

  const port = parseInt(process.env.PORT || '3000', 10);
  await server.start(port);

  console.log(`Governance pipeline ready on port ${port}`);

  const shutdown = async (signal: string) => {
    console.log(`${signal} received, shutting down gracefully...`);
    await server.stop();
    await pipeline.close();
    await shutdownTelemetry();
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((error) => {
      console.error('Error during shutdown:', error);
      process.exit(1);
    });
  });

  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((error) => {
      console.error('Error during shutdown:', error);
      process.exit(1);
    });
  });
}

main().catch((error) => {
  console.error('Fatal error starting application:', error);
  process.exit(1);
});

import Fastify, { type FastifyError } from 'fastify';
import { loadConfig, type AppConfig } from '../config/index.js';
import {
  AuthError,
  DeletionError,
  EvidenceToolError,
  InteractionRequiredError,
  ProviderError,
  SelectError,
} from '../core/errors.js';
import type { Interaction } from '../core/interaction.js';
import { registry } from '../metrics/index.js';
import type { CloudProvider } from '../provider/cloudProvider.js';
import { AwsCloudProvider } from '../provider/awsProvider.js';
import { CustodyRepository } from '../repositories/custodyRepository.js';
import { NotFoundError, RepositoryError } from '../repositories/errors.js';
import {
  FileRecoveryRepository,
  type RecoveryStore,
} from '../repositories/recoveryRepository.js';
import { createEvidenceBus, createToolkit } from '../services/evidenceToolkit.js';
import { getLogger } from '../utils/logging.js';
import { evidenceRoutes } from './routes/evidence.js';

export interface ServerOptions {
  config?: AppConfig;
  provider?: CloudProvider;
  recovery?: RecoveryStore;
  custody?: CustodyRepository;
  clock?: () => Date;
  operator?: string;
  host?: string;
}

const NOT_FOUND_CODES: ReadonlySet<string> = new Set(['INSTANCE_NOT_FOUND', 'SNAPSHOT_NOT_FOUND', 'NOT_FOUND']);
const CONFLICT_CODES: ReadonlySet<string> = new Set(['DEPENDENCY_VIOLATION', 'PROVIDER_REJECTED']);

function statusFor(error: EvidenceToolError): number {
  if (error instanceof AuthError) return 401;
  if (NOT_FOUND_CODES.has(error.code)) return 404;
  if (CONFLICT_CODES.has(error.code)) return 409;
  if (error instanceof InteractionRequiredError || error instanceof SelectError) return 400;
  if (error instanceof DeletionError) return 400;
  if (error instanceof ProviderError) return 502;
  return 500;
}

export async function buildServer(opts: ServerOptions = {}) {
  const cfg = opts.config ?? loadConfig();
  const app = Fastify({ logger: getLogger() });

  // Shared across requests: one provider, one bus with custody and metrics bound once.
  const provider =
    opts.provider ?? new AwsCloudProvider({ region: cfg.aws.region, profile: cfg.aws.profile });
  const recovery = opts.recovery ?? new FileRecoveryRepository(cfg.recovery.directory);
  const custody = opts.custody ?? new CustodyRepository(cfg.custody.ledgerPath);
  const bus = createEvidenceBus(custody, { metrics: true });
  const toolkit = (io: Interaction) =>
    createToolkit(cfg, io, {
      provider,
      recovery,
      custody,
      bus,
      clock: opts.clock,
      operator: opts.operator,
      host: opts.host,
    });

  // Unified error handler; set before routes so the route plugin inherits it.
  app.setErrorHandler((error: FastifyError | Error, _req, reply) => {
    if (error instanceof EvidenceToolError) {
      const status = statusFor(error);
      if (status >= 500) app.log.error({ err: error }, 'workflow failed');
      return reply.status(status).send({
        error: {
          code: error.code,
          message: error.message,
          ...(error instanceof DeletionError && error.auditReportPath
            ? { auditReportPath: error.auditReportPath }
            : {}),
        },
      });
    }
    if (error instanceof NotFoundError) {
      return reply.status(404).send({ error: { code: 'NOT_FOUND', message: error.message } });
    }
    if (error instanceof RepositoryError) {
      return reply
        .status(500)
        .send({ error: { code: 'REPOSITORY_ERROR', message: error.message } });
    }
    if ('validation' in error && error.validation) {
      return reply
        .status(400)
        .send({ error: { code: 'VALIDATION_ERROR', message: error.message } });
    }
    app.log.error({ err: error }, 'Unhandled error');
    return reply
      .status(500)
      .send({ error: { code: 'INTERNAL', message: 'Internal Server Error' } });
  });

  app.get('/healthz', async () => {
    return {
      status: 'ok',
      time: new Date().toISOString(),
      build: {
        version: process.env.npm_package_version || 'dev',
        node: process.version,
      },
      region: await provider.getRegion(),
      recovery: { pending: (await recovery.list()).length },
      custody: { ledger: custody.location },
    };
  });

  app.get('/metrics', async (_req, reply) => {
    const body = await registry.metrics();
    reply.header('Content-Type', registry.contentType);
    return reply.send(body);
  });

  await app.register(evidenceRoutes, { toolkit, reportDirectory: cfg.reports.directory });

  return app;
}

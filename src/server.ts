import path from 'node:path';
import { fileURLToPath } from 'node:url';
import Fastify, { type FastifyInstance, type FastifyReply } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { ulid } from 'ulid';
import { loadConfig, type AppConfig } from './config.js';
import { ExtractionError, JobStateError, apiError } from './errors.js';
import { renderFailuresCsv, renderResultsCsv, renderResultsJson } from './lib/export.js';
import { newJobId } from './lib/ids.js';
import { REDACT_PATHS } from './lib/logger.js';
import { normalizeIdentifiers } from './lib/normalize.js';
import { requireApiKey } from './middleware/auth.js';
import { EnqueueRateLimiter, enqueueRateLimit } from './middleware/rate-limit.js';
import { parseRequest } from './middleware/validation.js';
import { createExtractionRepository, type ExtractionRepository } from './repositories/index.js';
import { CreateExtractionSchema, HistoryQuerySchema, JobParamsSchema, ResultsQuerySchema } from './schemas/job.js';
import { createCarrierDataSourceFactory, type CarrierDataSourceFactory } from './sources/index.js';
import { isTerminal, type ExtractionJob } from './types/job.js';
import { ExtractionOrchestrator } from './worker/orchestrator.js';
import type { Sleep } from './worker/sleep.js';

const OPENAPI_PATH = fileURLToPath(new URL('../contracts/openapi.yaml', import.meta.url));

export interface ServerOptions {
  config?: AppConfig;
  repo?: ExtractionRepository;
  createDataSource?: CarrierDataSourceFactory;
  sleep?: Sleep;
}

function notFound(reply: FastifyReply, jobId: string) {
  return reply.code(404).send(apiError('Not Found', `Job ${jobId} not found`, 'JOB_NOT_FOUND'));
}

function serializeJob(job: ExtractionJob, running: boolean) {
  return {
    jobId: job.id,
    status: job.status,
    total: job.total,
    processedCount: job.processedCount,
    failedCount: job.failedCount,
    createdAt: job.createdAt.toISOString(),
    completedAt: job.completedAt?.toISOString() ?? null,
    errorMessage: job.errorMessage,
    running,
  };
}

export async function createServer(options: ServerOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? loadConfig();
  const repo = options.repo ?? createExtractionRepository(config.repo);
  const createDataSource = options.createDataSource ?? createCarrierDataSourceFactory(config.source);

  const app = Fastify({
    logger: {
      level: config.logLevel,
      redact: REDACT_PATHS,
    },
    bodyLimit: 2 * 1024 * 1024,
    genReqId: () => ulid(),
  });

  const orchestrator = new ExtractionOrchestrator({
    repo,
    createDataSource,
    config: config.extraction,
    logger: app.log,
    sleep: options.sleep,
  });

  const enqueueLimiter = config.api.rateLimitEnabled
    ? new EnqueueRateLimiter({ burst: config.api.enqueueBurst, sustainedPerMin: config.api.enqueueSustainedPerMin })
    : null;
  const submitGuards = [requireApiKey(config.api.apiKey), enqueueRateLimit(enqueueLimiter)];
  const keyGuards = [requireApiKey(config.api.apiKey)];

  await app.register(helmet, {
    contentSecurityPolicy: false,
  });

  if (config.api.corsDev) {
    await app.register(cors, {
      origin: ['http://localhost:3000', 'http://localhost:5173'],
      credentials: true,
    });
  }

  await app.register(swagger, {
    mode: 'static',
    specification: {
      path: OPENAPI_PATH,
      baseDir: path.dirname(OPENAPI_PATH),
    },
  });

  await app.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: false,
    },
  });

  app.addContentTypeParser('text/csv', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  app.addHook('onRequest', async (request, reply) => {
    reply.header('X-Request-ID', request.id);
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof JobStateError) {
      return reply.code(409).send(apiError('Conflict', error.message, error.code));
    }
    if (error.validation || error.statusCode === 400 || error.statusCode === 415) {
      return reply.code(error.statusCode ?? 400).send(apiError('Bad Request', error.message, 'BAD_REQUEST'));
    }
    if (error.statusCode === 413) {
      return reply.code(413).send(apiError('Payload Too Large', error.message, 'PAYLOAD_TOO_LARGE'));
    }

    request.log.error({ err: error }, 'Unhandled request error');
    const code = error instanceof ExtractionError ? error.code : 'INTERNAL_ERROR';
    return reply.code(500).send(apiError('Internal Server Error', 'Something went wrong', code));
  });

  async function submit(text: string, reply: FastifyReply) {
    const identifiers = normalizeIdentifiers(text, app.log);
    if (identifiers.length === 0) {
      return reply.code(400).send(apiError('Bad Request', 'No valid MC numbers found in input', 'NO_VALID_IDENTIFIERS'));
    }

    const jobId = newJobId();
    orchestrator.start(jobId, identifiers);
    app.log.info({ jobId, total: identifiers.length }, 'Started extraction job');

    return reply.code(202).send({
      jobId,
      total: identifiers.length,
      status: 'processing',
      message: `Extraction job started. Use /extractions/${jobId} to check progress.`,
    });
  }

  app.get('/health', async () => {
    const jobs = await repo.getStats();

    return {
      ok: true,
      jobs,
      worker: orchestrator.getStats(),
      repo: { kind: config.repo.kind },
      source: { kind: config.source.kind },
      limits: {
        maxConcurrentJobs: config.extraction.maxConcurrentJobs,
        requestsPerMinute: config.extraction.requestsPerMinute,
        maxRetries: config.extraction.maxRetries,
      },
    };
  });

  // POST /extractions - start a job from a JSON list or free text
  app.post('/extractions', { preHandler: submitGuards }, async (request, reply) => {
    const body = parseRequest(CreateExtractionSchema, request.body, 'body', reply);
    if (!body) return;

    const text = [body.text ?? '', ...(body.identifiers ?? [])].join('\n');
    return submit(text, reply);
  });

  // POST /extractions/upload - raw text/plain or text/csv file body
  app.post('/extractions/upload', { preHandler: submitGuards }, async (request, reply) => {
    if (typeof request.body !== 'string') {
      return reply.code(415).send(apiError('Unsupported Media Type', 'Send the file as text/plain or text/csv', 'UNSUPPORTED_MEDIA_TYPE'));
    }
    return submit(request.body, reply);
  });

  // GET /extractions - job history, newest first
  app.get('/extractions', { preHandler: keyGuards }, async (request, reply) => {
    const query = parseRequest(HistoryQuerySchema, request.query, 'query', reply);
    if (!query) return;

    const jobs = await repo.listJobs({ limit: query.limit });
    return { jobs: jobs.map(job => serializeJob(job, orchestrator.registry.has(job.id))) };
  });

  app.get('/extractions/:jobId', { preHandler: keyGuards }, async (request, reply) => {
    const params = parseRequest(JobParamsSchema, request.params, 'params', reply);
    if (!params) return;

    const job = await repo.getJob(params.jobId);
    if (!job) return notFound(reply, params.jobId);

    return serializeJob(job, orchestrator.registry.has(job.id));
  });

  app.get('/extractions/:jobId/results', { preHandler: keyGuards }, async (request, reply) => {
    const params = parseRequest(JobParamsSchema, request.params, 'params', reply);
    if (!params) return;
    const query = parseRequest(ResultsQuerySchema, request.query, 'query', reply);
    if (!query) return;

    const job = await repo.getJob(params.jobId);
    if (!job) return notFound(reply, params.jobId);

    const records = await repo.getRecords(job.id);
    if (records.length === 0) {
      return reply.code(404).send(apiError('Not Found', `No results found for job ${job.id}`, 'NO_RESULTS'));
    }

    if (query.format === 'json') {
      return reply
        .header('Content-Type', 'application/json; charset=utf-8')
        .header('Content-Disposition', `attachment; filename="extracted_carriers_${job.id}.json"`)
        .send(renderResultsJson(records));
    }

    return reply
      .header('Content-Type', 'text/csv; charset=utf-8')
      .header('Content-Disposition', `attachment; filename="extracted_carriers_${job.id}.csv"`)
      .send(renderResultsCsv(records));
  });

  app.get('/extractions/:jobId/failures', { preHandler: keyGuards }, async (request, reply) => {
    const params = parseRequest(JobParamsSchema, request.params, 'params', reply);
    if (!params) return;

    const job = await repo.getJob(params.jobId);
    if (!job) return notFound(reply, params.jobId);

    const failures = await repo.getFailures(job.id);
    if (failures.length === 0) {
      return reply.code(404).send(apiError('Not Found', `No failed extractions found for job ${job.id}`, 'NO_FAILURES'));
    }

    return reply
      .header('Content-Type', 'text/csv; charset=utf-8')
      .header('Content-Disposition', `attachment; filename="failed_extractions_${job.id}.csv"`)
      .send(renderFailuresCsv(failures));
  });

  app.post('/extractions/:jobId/cancel', { preHandler: keyGuards }, async (request, reply) => {
    const params = parseRequest(JobParamsSchema, request.params, 'params', reply);
    if (!params) return;

    const job = await repo.getJob(params.jobId);
    if (!job) return notFound(reply, params.jobId);

    if (isTerminal(job.status)) {
      return reply.code(409).send(apiError('Conflict', `Job cannot be cancelled in ${job.status} state`, 'INVALID_STATE'));
    }

    // A job this process is not running (e.g. left over from a restart) is closed out directly
    if (!orchestrator.cancel(job.id)) {
      await repo.updateJob(job.id, { status: 'cancelled' });
    }

    return reply.code(202).send({ jobId: job.id, message: 'Cancel request accepted' });
  });

  app.addHook('onClose', async () => {
    await orchestrator.stop();
  });

  return app;
}

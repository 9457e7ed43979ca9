import Fastify, { type FastifyInstance, type FastifyRequest } from "fastify";
import { Pool } from "pg";
import { InMemoryAccountStore, loadAccountSeedFile } from "./adapters/inmemory/account-store.js";
import { InMemoryCaseStore } from "./adapters/inmemory/case-store.js";
import { PostgresAccountStore } from "./adapters/postgres/account-store.js";
import { PostgresCaseStore } from "./adapters/postgres/case-store.js";
import { presentError, presentResult } from "./api/envelope.js";
import { toCaseResponse, toCustomerResponse } from "./api/presenters.js";
import {
  assertAttachDocumentsInput,
  assertFileDisputeInput,
  assertResolveCaseInput,
  normalizeLimit,
  normalizeResourceId,
} from "./api/validators.js";
import { CaseLifecycleManager, type LifecycleObserver } from "./application/case-lifecycle.js";
import { DuplicateGuard } from "./application/duplicate-guard.js";
import { PersistenceGateway } from "./application/persistence-gateway.js";
import { RetryPolicy } from "./application/retry-policy.js";
import { DisputeDecisionEngine } from "./domain/decision-engine.js";
import { AppError } from "./infra/app-error.js";
import { SystemClock, type ClockPort, type SleepFn } from "./infra/clock.js";
import { loadRuntimeConfig, type RuntimeConfig } from "./infra/config.js";
import { createLogger, type LoggerPort } from "./infra/logger.js";
import { DisputeMetricsRegistry } from "./infra/metrics.js";
import type { AccountStorePort } from "./ports/account-store.js";
import type { CaseStorePort } from "./ports/case-store.js";

export interface AppDependencies {
  accountStore?: AccountStorePort;
  caseStore?: CaseStorePort;
  clock?: ClockPort;
  sleep?: SleepFn;
  logger?: LoggerPort;
}

function requireBearerApiKey(headers: Record<string, unknown>, validApiKeys: ReadonlySet<string>): string {
  const authorization = headers.authorization;
  if (typeof authorization !== "string" || !authorization.startsWith("Bearer ")) {
    throw new AppError(401, "missing_api_key", "Authorization header with Bearer API key is required.");
  }

  const token = authorization.slice("Bearer ".length).trim();
  if (!token || !validApiKeys.has(token)) {
    throw new AppError(401, "invalid_api_key", "Invalid API key.");
  }

  return token;
}

/** Body parser and content-type failures carry a 4xx statusCode. */
function clientErrorStatus(error: unknown): number | undefined {
  if (
    typeof error === "object"
    && error !== null
    && "statusCode" in error
    && typeof error.statusCode === "number"
    && error.statusCode >= 400
    && error.statusCode < 500
  ) {
    return error.statusCode;
  }
  return undefined;
}

export function buildApp(
  config: RuntimeConfig = loadRuntimeConfig(),
  deps: AppDependencies = {},
): FastifyInstance {
  const app = Fastify({ logger: false });
  const logger = deps.logger ?? createLogger(config.logLevel);
  const metrics = new DisputeMetricsRegistry();
  const validApiKeys = new Set<string>(config.apiKeys.length > 0 ? config.apiKeys : [config.apiKey]);
  const requestStarts = new WeakMap<FastifyRequest, bigint>();
  const closeActions: Array<() => Promise<void>> = [];

  const clock = deps.clock ?? new SystemClock();
  const postgresPool =
    config.storeBackend === "postgres" && config.postgresUrl && (!deps.accountStore || !deps.caseStore)
      ? new Pool({ connectionString: config.postgresUrl })
      : null;
  if (postgresPool) {
    closeActions.push(async () => {
      await postgresPool.end();
    });
  }

  const requirePool = (): Pool => {
    if (!postgresPool) {
      throw new AppError(500, "invalid_runtime_config", "Postgres store backend requested without PostgreSQL.");
    }
    return postgresPool;
  };

  const accountStore =
    deps.accountStore
    ?? (config.storeBackend === "postgres"
      ? new PostgresAccountStore(requirePool())
      : new InMemoryAccountStore(config.seedFile ? loadAccountSeedFile(config.seedFile) : undefined));
  const caseStore =
    deps.caseStore
    ?? (config.storeBackend === "postgres" ? new PostgresCaseStore(requirePool()) : new InMemoryCaseStore());

  const retryPolicy = new RetryPolicy({
    maxAttempts: config.storeMaxAttempts,
    initialDelayMs: config.storeRetryDelayMs,
    backoff: config.storeRetryBackoff,
    ...(deps.sleep ? { sleep: deps.sleep } : {}),
    onRetry: (event) => {
      if (config.metricsEnabled) {
        metrics.recordStoreRetry(event.operation);
      }
      logger.warn(
        { operation: event.operation, attempt: event.attempt, delay_ms: event.delayMs },
        "store throttled, retrying",
      );
    },
  });
  const gateway = new PersistenceGateway(accountStore, caseStore, retryPolicy, logger);
  const guard = new DuplicateGuard(gateway, logger);
  const engine = new DisputeDecisionEngine({
    timeBarredDays: config.timeBarredDays,
    autoResolveAmount: config.autoResolveAmount,
  });
  const observer: LifecycleObserver = {
    caseFiled: (record) => metrics.recordDisputeFiled(record.dispute_status),
    duplicateRejected: () => metrics.recordDuplicateRejection(),
    caseResolved: (record) => metrics.recordCaseResolution(record.dispute_status),
  };
  const lifecycle = new CaseLifecycleManager(gateway, guard, engine, clock, logger, {
    allowRefileAfterTerminal: config.allowRefileAfterTerminal,
    defaultListLimit: config.caseListDefaultLimit,
    maxListLimit: config.caseListMaxLimit,
    ...(config.metricsEnabled ? { observer } : {}),
  });

  app.get("/health/live", async (_, reply) => {
    return reply.status(200).send({ status: "ok" });
  });

  app.get("/health/ready", async (_, reply) => {
    try {
      await gateway.ping();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return reply.status(503).send({ status: "unavailable", message });
    }
    return reply.status(200).send({ status: "ready" });
  });

  app.addHook("onRequest", async (request, reply) => {
    requestStarts.set(request, process.hrtime.bigint());
    if (request.url.startsWith("/health/")) {
      return;
    }
    if (config.metricsEnabled && request.url === "/metrics") {
      return;
    }
    requireBearerApiKey(request.headers, validApiKeys);
    reply.header("X-Request-Id", request.id);
  });

  app.addHook("onResponse", async (request, reply) => {
    if (!config.metricsEnabled) {
      return;
    }
    const startNs = requestStarts.get(request);
    if (!startNs) {
      return;
    }
    const durationSeconds = Number(process.hrtime.bigint() - startNs) / 1_000_000_000;
    const route = request.routeOptions.url ?? request.url.split("?")[0] ?? "unmatched";
    metrics.recordHttpRequest(request.method, route, reply.statusCode, durationSeconds);
  });

  app.get<{ Params: { id: string } }>("/v1/customers/:id", async (request, reply) => {
    const customerId = normalizeResourceId(request.params.id, "customer_id");
    const result = await lifecycle.getCustomer(customerId);
    return presentResult(reply, result, 200, toCustomerResponse);
  });

  app.post("/v1/disputes", async (request, reply) => {
    assertFileDisputeInput(request.body);
    const { customer_id, transaction_id, filed_at } = request.body;
    const result = await lifecycle.fileDispute(customer_id.trim(), transaction_id.trim(), filed_at);
    return presentResult(reply, result, 201, toCaseResponse);
  });

  app.get<{ Params: { id: string } }>("/v1/cases/:id", async (request, reply) => {
    const caseId = normalizeResourceId(request.params.id, "case_id");
    const result = await lifecycle.getCase(caseId);
    return presentResult(reply, result, 200, toCaseResponse);
  });

  app.get<{ Params: { id: string }; Querystring: { limit?: string } }>(
    "/v1/customers/:id/cases",
    async (request, reply) => {
      const customerId = normalizeResourceId(request.params.id, "customer_id");
      const limit = normalizeLimit(request.query.limit, config.caseListDefaultLimit, config.caseListMaxLimit);
      const result = await lifecycle.getCasesForCustomer(customerId, limit);
      return presentResult(reply, result, 200, (cases) => cases.map(toCaseResponse));
    },
  );

  app.post<{ Params: { id: string } }>("/v1/cases/:id/documents", async (request, reply) => {
    const caseId = normalizeResourceId(request.params.id, "case_id");
    assertAttachDocumentsInput(request.body);
    const result = await lifecycle.attachDocuments(caseId, request.body.documents);
    return presentResult(reply, result, 200, toCaseResponse);
  });

  app.post<{ Params: { id: string } }>("/v1/cases/:id/resolve", async (request, reply) => {
    const caseId = normalizeResourceId(request.params.id, "case_id");
    assertResolveCaseInput(request.body);
    const result = await lifecycle.resolveCase(caseId, request.body.status, request.body.reason);
    return presentResult(reply, result, 200, toCaseResponse);
  });

  if (config.metricsEnabled) {
    app.get("/metrics", async (_request, reply) => {
      const payload = metrics.renderPrometheus();
      return reply
        .header("Content-Type", "text/plain; version=0.0.4; charset=utf-8")
        .status(200)
        .send(payload);
    });
  }

  app.setNotFoundHandler(async (_, reply) => {
    return presentError(reply, new AppError(404, "resource_not_found", "Route not found."));
  });

  app.setErrorHandler(async (error, request, reply) => {
    if (error instanceof AppError) {
      return presentError(reply, error);
    }
    const statusCode = clientErrorStatus(error);
    if (statusCode !== undefined) {
      const message = error instanceof Error ? error.message : "Malformed request.";
      return presentError(reply, new AppError(400, "invalid_request_body", message));
    }
    logger.error({ err: error, request_id: request.id }, "unhandled error");
    return presentError(reply, new AppError(500, "internal_failure", "Unexpected error."));
  });

  app.addHook("onClose", async () => {
    for (const closeAction of [...closeActions].reverse()) {
      await closeAction();
    }
  });

  return app;
}

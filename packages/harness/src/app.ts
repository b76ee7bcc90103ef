/**
 * Harness Application
 *
 * Bootstrap + lifecycle management.
 *
 * Lifecycle:
 * - On startup: wire the validator bridge, sandbox gateway, transcript store
 *   and orchestrator; serve the read API and internal metrics
 * - Runs are started through `runBatch` by an embedding program that owns
 *   the code generator
 * - On shutdown: cancel in-flight runs, close servers and the database pool
 */

// Load environment variables from .env file
import 'dotenv/config';

import express, { Express } from 'express';
import { realpathSync } from 'node:fs';
import type { Server } from 'http';
import { pathToFileURL } from 'node:url';
import type { Pool } from 'pg';

import { SolanaValidatorBridge, DEFAULT_AIRDROP_LAMPORTS } from './bridge/solana-bridge.js';
import type { ValidatorBridge } from './bridge/validator-bridge.js';
import type { CodeGeneratorFactory } from './generator/index.js';
import { createRoutes, errorHandler } from './http/index.js';
import { startMetricsServer } from './metrics/index.js';
import { MetricsRecorder } from './metrics/recorder.js';
import { createPostgresTranscriptStore } from './persistence/postgres/index.js';
import { BatchOutcome, DEFAULT_TURN_BUDGET, RunRequest, TurnOrchestrator } from './runs/orchestrator.js';
import { FileTranscriptStore, TranscriptStore } from './runs/transcript-store.js';
import { ProcessSandboxGateway, SandboxGateway } from './sandbox/gateway.js';
import { createLogger, Logger, LogLevel } from './utils/index.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface HarnessConfig {
  // Server
  port: number;
  host: string;
  metricsPort: number;

  // Validator
  rpcUrl: string;
  rpcTimeoutMs: number;
  confirmTimeoutMs: number;
  pollIntervalMs: number;
  airdropLamports: number;
  skipPreflight: boolean;

  // Sandbox
  artifactDir: string;
  executionTimeoutMs: number;
  killGraceMs: number;

  // Runs
  turnBudget: number;
  batchConcurrency: number;

  // Persistence (Postgres when set, JSON files otherwise)
  databaseUrl?: string;
  transcriptDir: string;

  // Logging
  logLevel: LogLevel;
}

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function parseLogLevel(value: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? 'info';
}

function parsePositiveInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = parseInt(raw, 10);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

export function loadConfigFromEnv(): HarnessConfig {
  return {
    port: parsePositiveInt('PORT', 3000),
    host: process.env.HOST ?? '0.0.0.0',
    metricsPort: parsePositiveInt('METRICS_PORT', 9090),
    rpcUrl: process.env.RPC_URL ?? 'http://127.0.0.1:8899',
    rpcTimeoutMs: parsePositiveInt('RPC_TIMEOUT_MS', 10_000),
    confirmTimeoutMs: parsePositiveInt('CONFIRM_TIMEOUT_MS', 30_000),
    pollIntervalMs: parsePositiveInt('POLL_INTERVAL_MS', 500),
    airdropLamports: parsePositiveInt('AIRDROP_LAMPORTS', DEFAULT_AIRDROP_LAMPORTS),
    skipPreflight: process.env.SKIP_PREFLIGHT !== 'false',
    artifactDir: process.env.SANDBOX_ARTIFACT_DIR ?? '.sandbox',
    executionTimeoutMs: parsePositiveInt('EXECUTION_TIMEOUT_MS', 30_000),
    killGraceMs: parsePositiveInt('KILL_GRACE_MS', 2_000),
    turnBudget: parsePositiveInt('TURN_BUDGET', DEFAULT_TURN_BUDGET),
    batchConcurrency: Math.max(1, parsePositiveInt('BATCH_CONCURRENCY', 4)),
    databaseUrl: process.env.DATABASE_URL || undefined,
    transcriptDir: process.env.TRANSCRIPT_DIR ?? 'metrics',
    logLevel: parseLogLevel(process.env.LOG_LEVEL),
  };
}

// =============================================================================
// HARNESS APPLICATION
// =============================================================================

export interface HarnessOverrides {
  bridge?: ValidatorBridge;
  gateway?: SandboxGateway;
  store?: TranscriptStore;
  logger?: Logger;
}

export class Harness {
  private config: HarnessConfig;
  private logger: Logger;
  private app: Express;
  private pool?: Pool;
  private store: TranscriptStore;
  readonly orchestrator: TurnOrchestrator;
  readonly recorder: MetricsRecorder;
  private server?: Server;
  private metricsServer?: Server;
  private inFlight = new AbortController();
  private shutdownPromise?: Promise<void>;

  constructor(config: HarnessConfig, overrides: HarnessOverrides = {}) {
    this.config = config;
    this.logger = overrides.logger ?? createLogger({ level: config.logLevel, service: 'harness' });
    this.app = express();

    if (overrides.store) {
      this.store = overrides.store;
    } else if (config.databaseUrl) {
      const { store, pool } = createPostgresTranscriptStore(config.databaseUrl);
      this.store = store;
      this.pool = pool;
    } else {
      this.store = new FileTranscriptStore(config.transcriptDir);
    }

    const bridge =
      overrides.bridge ??
      new SolanaValidatorBridge(
        {
          rpcUrl: config.rpcUrl,
          rpcTimeoutMs: config.rpcTimeoutMs,
          confirmTimeoutMs: config.confirmTimeoutMs,
          pollIntervalMs: config.pollIntervalMs,
          airdropLamports: config.airdropLamports,
          skipPreflight: config.skipPreflight,
        },
        undefined,
        this.logger.child({ component: 'bridge' })
      );

    const gateway =
      overrides.gateway ??
      new ProcessSandboxGateway(
        { artifactRoot: config.artifactDir, killGraceMs: config.killGraceMs },
        undefined,
        this.logger.child({ component: 'sandbox' })
      );

    this.recorder = new MetricsRecorder(this.store, this.logger.child({ component: 'metrics' }));
    this.orchestrator = new TurnOrchestrator({
      gateway,
      bridge,
      recorder: this.recorder,
      executionTimeoutMs: config.executionTimeoutMs,
      defaultBudget: config.turnBudget,
      logger: this.logger.child({ component: 'orchestrator' }),
    });

    this.orchestrator.onEvent((event) => {
      switch (event.type) {
        case 'RUN_STARTED':
          this.logger.info({ runId: event.runId, model: event.model, identity: event.identity }, 'Run started');
          break;
        case 'PHASE_ENTERED':
          this.logger.debug({ runId: event.runId, turn: event.turn, phase: event.phase }, 'Phase entered');
          break;
        case 'RUN_TERMINATED':
          this.logger.info(
            { runId: event.runId, reason: event.termination.reason, cumulativeReward: event.cumulativeReward },
            'Run finished'
          );
          break;
      }
    });
  }

  /**
   * Start the read API and the internal metrics server.
   */
  async start(): Promise<void> {
    this.logger.info(
      { rpcUrl: this.config.rpcUrl, store: this.config.databaseUrl ? 'postgres' : this.config.transcriptDir },
      'Starting harness...'
    );

    this.app.use(express.json({ limit: '1mb' }));
    this.app.use(createRoutes({ store: this.store }, this.logger));
    this.app.use(errorHandler(this.logger));

    await new Promise<void>((resolve) => {
      this.server = this.app.listen(this.config.port, this.config.host, () => {
        this.logger.info({ port: this.config.port, host: this.config.host }, 'Read API started');
        resolve();
      });
    });

    this.metricsServer = startMetricsServer(this.config.metricsPort);
    this.logger.info({ port: this.config.metricsPort }, 'Internal metrics server started (Prometheus /metrics)');

    this.setupShutdownHandlers();
  }

  /**
   * Run independent runs concurrently. Each request gets its own generator,
   * ledger, identity and artifact namespace.
   */
  async runBatch(requests: RunRequest[], generatorFactory: CodeGeneratorFactory): Promise<BatchOutcome[]> {
    return this.orchestrator.runBatch(requests, generatorFactory, {
      concurrency: this.config.batchConcurrency,
      signal: this.inFlight.signal,
    });
  }

  /**
   * Stop gracefully: cancel in-flight runs, close servers and connections.
   */
  async stop(): Promise<void> {
    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }
    this.shutdownPromise = this.doStop();
    return this.shutdownPromise;
  }

  private async doStop(): Promise<void> {
    this.logger.info({}, 'Stopping harness...');
    this.inFlight.abort();

    const server = this.server;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      this.logger.info({}, 'Read API stopped');
    }

    if (this.metricsServer) {
      this.metricsServer.close();
    }

    if (this.pool) {
      await this.pool.end();
      this.logger.info({}, 'Database connections closed');
    }

    this.logger.info({}, 'Harness stopped');
  }

  private setupShutdownHandlers(): void {
    const shutdown = (signal: string) => {
      this.logger.info({ signal }, 'Received shutdown signal');
      void this.stop().then(
        () => process.exit(0),
        (err: unknown) => {
          this.logger.error({ err }, 'Shutdown failed');
          process.exit(1);
        }
      );
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  }
}

// =============================================================================
// ENTRY POINT
// =============================================================================

export async function main(): Promise<void> {
  const config = loadConfigFromEnv();
  const harness = new Harness(config);
  await harness.start();
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  return script !== undefined && import.meta.url === pathToFileURL(realpathSync(script)).href;
}

if (isEntryPoint()) {
  main().catch((err) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
}

import "dotenv/config";
import { loadConfig } from "./config";
import { HttpContextRetrieval, HttpDecisionEngine, HttpToolService } from "./collaborators/http";
import { createPool, createRedis } from "./db";
import { ExecutionDriver } from "./engine/driver";
import { HealthService } from "./grpc/health.service";
import { createGrpcServer, startGrpcServer } from "./grpc/server";
import { JobRunner } from "./job-runner";
import { JobRepository } from "./repositories/job.repository";
import { StepRepository } from "./repositories/step.repository";
import { WorkflowRepository } from "./repositories/workflow.repository";
import { QueueDispatcher } from "./services/dispatcher";
import { EventLoopMonitor } from "./services/event-loop-monitor";
import { HeartbeatService } from "./services/heartbeat.service";
import { JobReaper } from "./services/job-reaper";
import { MetricsCollector } from "./services/metrics-collector";
import { Poller } from "./services/poller";
import { ProactiveWorkflowService } from "./services/proactive-workflow.service";
import { ToolReminderDispatch } from "./services/reminder-dispatch";
import { RetentionSweeper } from "./services/retention-sweeper";
import { TimeoutMonitor } from "./services/timeout-monitor";

const TAG = "[proactive]";

const config = loadConfig();

// Wiring
const pool = createPool(config.databaseUrl);
const redis = createRedis(config.redisUrl);

pool.on("error", (err) => console.error(`${TAG} idle client error:`, err));

const workflowRepo = new WorkflowRepository(pool);
const stepRepo = new StepRepository(pool);
const jobRepo = new JobRepository(pool, config.jobMaxRetries);

const tools = new HttpToolService(config.toolsUrl);
const driver = new ExecutionDriver(workflowRepo, stepRepo, {
  tools,
  decisions: new HttpDecisionEngine(config.decisionUrl),
  retrieval: new HttpContextRetrieval(config.contextUrl),
}, {
  staleSeconds: config.runnerStaleSeconds,
  maxStepsPerPass: config.maxStepsPerPass,
});

const heartbeat = new HeartbeatService(config.heartbeatIntervalMs);
const runner = new JobRunner(driver, workflowRepo, jobRepo, heartbeat, new ToolReminderDispatch(tools));
const service = new ProactiveWorkflowService(workflowRepo, stepRepo, new QueueDispatcher(jobRepo));

const leaderOpts = { leaderTtlSeconds: config.leaderTtlSeconds, workerId: config.workerId };
const timeoutMonitor = new TimeoutMonitor(workflowRepo, jobRepo, redis, {
  ...leaderOpts,
  intervalMs: config.timeoutCheckIntervalMs,
  extensionHours: config.reminderExtensionHours,
});
const reaper = new JobReaper(jobRepo, redis, {
  ...leaderOpts,
  intervalMs: config.jobReaperIntervalMs,
  staleSeconds: config.runnerStaleSeconds,
});
const sweeper = new RetentionSweeper(workflowRepo, jobRepo, redis, {
  ...leaderOpts,
  intervalMs: config.retentionIntervalMs,
  retentionDays: config.retentionDays,
});

const metrics = new MetricsCollector(workflowRepo, redis, {
  ...leaderOpts,
  intervalMs: config.metricsIntervalMs,
  windowHours: config.metricsWindowHours,
});

// Components
let poller: Poller | null = null;
let monitor: EventLoopMonitor | null = null;

async function main() {
  console.log(`${TAG} starting engine... (worker: ${config.workerId})`);

  // Health checks
  await pool.query("SELECT 1");
  console.log(`${TAG} postgres connected`);

  await redis.ping();
  console.log(`${TAG} redis connected`);

  // gRPC
  const grpcServer = createGrpcServer(service, new HealthService(pool, redis));
  await startGrpcServer(grpcServer, config.port);

  // Periodic jobs (leader only)
  timeoutMonitor.start();
  reaper.start();
  sweeper.start();
  metrics.start();

  // Backpressure
  const loop = new EventLoopMonitor();
  monitor = loop;
  const checkBackpressure = () => {
    const active = heartbeat.activeCount;
    if (active >= config.maxQueueSize) {
      console.warn(`${TAG} [backpressure] ${active} active jobs >= ${config.maxQueueSize}`);
      return true;
    }
    if (loop.isLagging(config.maxEventLoopLag)) {
      console.warn(`${TAG} [backpressure] Event loop lag ${loop.lag.toFixed(2)}ms >= ${config.maxEventLoopLag}ms`);
      return true;
    }
    return false;
  };

  // Poller
  poller = new Poller(jobRepo, {
    workerId: config.workerId,
    batchSize: config.pollBatchSize,
    checkBackpressure,
    onJobReceived: (job) => runner.run(job),
  });
  poller.start();

  console.log(`${TAG} engine ready`);
}

async function shutdown(signal: string) {
  console.log(`${TAG} ${signal} received, shutting down...`);

  if (poller) await poller.stop();
  heartbeat.stopAll();
  await timeoutMonitor.stop();
  await reaper.stop();
  await sweeper.stop();
  await metrics.stop();
  monitor?.disable();

  await pool.end();
  await redis.quit();
  console.log(`${TAG} shutdown complete`);
  process.exit(0);
}

for (const signal of ["SIGTERM", "SIGINT", "SIGUSR2"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err) => {
      console.error(`${TAG} shutdown failed:`, err);
      process.exit(1);
    });
  });
}

main().catch((err) => {
  console.error(`${TAG} fatal:`, err);
  process.exit(1);
});

import { loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { createPool, createStore } from './store.js';
import { systemClock } from './domain/clock.js';
import { buildServer } from './api/server.js';
import { loadSemesterPolicy } from './features/semester-gate/semester-policy.js';
import { loadGradingScale } from './features/semester-gate/grading-scale.js';
import { PostgresCheckpointStore } from './features/certificates/checkpoints.js';
import { loggingNotifier, startCertificateRelay } from './features/certificates/certificate-relay.js';

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
}

// Policy files are validated before anything connects
const [policy, gradingScale] = await Promise.all([
  loadSemesterPolicy(config.semesterPolicyPath),
  loadGradingScale(config.gradingScalePath),
]);

const pool = createPool(config.databaseUrl);
const store = createStore(pool);
await store.initializeSchema();

const checkpoints = new PostgresCheckpointStore(pool);
await checkpoints.initialize();

const app = buildServer(store, systemClock, {
  policy,
  gradingScale,
  defaultCourseDurationDays: config.defaultCourseDurationDays,
  logLevel: config.logLevel,
});

const relay = startCertificateRelay(store, {
  checkpoints,
  notifier: loggingNotifier(app.log),
  logger: app.log,
  intervalMs: config.certificateRelayIntervalMs,
});

async function shutdown(): Promise<void> {
  await relay.stop();
  await app.close();
  await store.close();
}

try {
  await app.listen({ port: config.port, host: '0.0.0.0' });
} catch (err) {
  app.log.error(err);
  await shutdown();
  process.exit(1);
}

process.once('SIGTERM', () => {
  shutdown().catch((err: unknown) => {
    app.log.error(err);
    process.exitCode = 1;
  });
});

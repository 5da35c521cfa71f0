import Fastify from 'fastify';
import type { LifecycleStore } from '../store.js';
import type { Clock } from '../domain/clock.js';
import type { AppConfig } from '../config.js';
import { registerErrorHandler } from './middleware/error-handler.js';
import { registerCatalogRoutes } from '../features/catalog/routes.js';
import { registerStudentRoutes } from '../features/students/routes.js';
import { registerEnrollmentRoutes } from '../features/enrollments/routes.js';
import { registerProgressRoutes } from '../features/progress/routes.js';
import { registerCertificateRoutes } from '../features/certificates/routes.js';
import { registerWithdrawalRoutes } from '../features/withdrawals/routes.js';
import { registerSemesterGateRoutes } from '../features/semester-gate/routes.js';
import type { SemesterPolicy } from '../features/semester-gate/semester-policy.js';
import type { GradingScale } from '../features/semester-gate/grading-scale.js';

export interface ServerOptions {
  policy: SemesterPolicy;
  gradingScale: GradingScale;
  defaultCourseDurationDays: number;
  logLevel: AppConfig['logLevel'];
}

export function buildServer(store: LifecycleStore, clock: Clock, options: ServerOptions) {
  const app = Fastify({ logger: { level: options.logLevel } });

  registerErrorHandler(app);

  const prefix = '/api/v1';

  app.register(async (instance) => {
    await registerCatalogRoutes(instance, store, clock, { defaultDurationDays: options.defaultCourseDurationDays });
    await registerStudentRoutes(instance, store, clock);
    await registerEnrollmentRoutes(instance, store, clock);
    await registerProgressRoutes(instance, store, clock);
    await registerCertificateRoutes(instance, store, clock);
    await registerWithdrawalRoutes(instance, store, clock);
    await registerSemesterGateRoutes(instance, options.policy, options.gradingScale);
  }, { prefix });

  return app;
}

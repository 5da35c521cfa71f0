import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { withConcurrencyRetry } from 'lifecycle-event-store';
import type { LifecycleStore } from '../../store.js';
import type { Clock } from '../../domain/clock.js';
import { closeStudentAccount } from './close-account.js';
import { listCertificates } from '../certificates/list-certificates.js';

const StudentParams = z.object({ studentId: z.string().min(1) });

export async function registerStudentRoutes(
  app: FastifyInstance,
  store: LifecycleStore,
  clock: Clock,
): Promise<void> {
  app.get('/students/:studentId/certificates', async (request, reply) => {
    const { studentId } = StudentParams.parse(request.params);
    return reply.status(200).send(await listCertificates(store, { studentId }));
  });

  // Account closure: ends every enrollment the student holds
  app.delete('/students/:studentId', async (request, reply) => {
    const { studentId } = StudentParams.parse(request.params);
    await withConcurrencyRetry(() => closeStudentAccount(store, clock, { studentId }));
    return reply.status(204).send();
  });
}

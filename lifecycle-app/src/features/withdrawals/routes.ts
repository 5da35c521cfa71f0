import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { withConcurrencyRetry } from 'lifecycle-event-store';
import type { LifecycleStore } from '../../store.js';
import type { Clock } from '../../domain/clock.js';
import { withdrawStudent } from './withdraw-student.js';
import { listDropouts } from './list-dropouts.js';

const CourseParams = z.object({ courseId: z.string().min(1) });
const PairParams = CourseParams.extend({ studentId: z.string().min(1) });
const WithdrawBody = z.object({ reason: z.string().default('') });

export async function registerWithdrawalRoutes(
  app: FastifyInstance,
  store: LifecycleStore,
  clock: Clock,
): Promise<void> {
  app.post('/courses/:courseId/students/:studentId/withdraw', async (request, reply) => {
    const pair = PairParams.parse(request.params);
    const { reason } = WithdrawBody.parse(request.body ?? {});
    const record = await withConcurrencyRetry(() => withdrawStudent(store, clock, { ...pair, reason }));
    return reply.status(201).send(record);
  });

  app.get('/courses/:courseId/dropouts', async (request, reply) => {
    const { courseId } = CourseParams.parse(request.params);
    return reply.status(200).send(await listDropouts(store, { courseId }));
  });
}

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { withConcurrencyRetry } from 'lifecycle-event-store';
import type { LifecycleStore } from '../../store.js';
import type { Clock } from '../../domain/clock.js';
import { enrollStudent, lookupEnrollment } from './enrollment-ledger.js';

const CourseParams = z.object({ courseId: z.string().min(1) });
const PairParams = z.object({ courseId: z.string().min(1), studentId: z.string().min(1) });
const EnrollBody = z.object({ studentId: z.string().min(1) });

export async function registerEnrollmentRoutes(
  app: FastifyInstance,
  store: LifecycleStore,
  clock: Clock,
): Promise<void> {
  app.post('/courses/:courseId/enrollments', async (request, reply) => {
    const { courseId } = CourseParams.parse(request.params);
    const { studentId } = EnrollBody.parse(request.body);
    const enrollment = await withConcurrencyRetry(() => enrollStudent(store, clock, { studentId, courseId }));
    return reply.status(201).send(enrollment);
  });

  app.get('/courses/:courseId/enrollments/:studentId', async (request, reply) => {
    const pair = PairParams.parse(request.params);
    const enrollment = await lookupEnrollment(store, pair);
    if (enrollment === null) {
      return reply.status(404).send({
        error: 'NotEnrolledError',
        message: `Student '${pair.studentId}' is not currently enrolled in course '${pair.courseId}'`,
      });
    }
    return reply.status(200).send(enrollment);
  });
}

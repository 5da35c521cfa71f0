import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { withConcurrencyRetry } from 'lifecycle-event-store';
import type { LifecycleStore } from '../../store.js';
import type { Clock } from '../../domain/clock.js';
import { recordAssignmentSubmission, recordLessonCompletion } from './record-activity.js';
import { getProgress } from './get-progress.js';

const PairParams = z.object({ courseId: z.string().min(1), studentId: z.string().min(1) });
const LessonParams = PairParams.extend({ lessonId: z.string().min(1) });
const AssignmentParams = PairParams.extend({ assignmentId: z.string().min(1) });

export async function registerProgressRoutes(
  app: FastifyInstance,
  store: LifecycleStore,
  clock: Clock,
): Promise<void> {
  app.post('/courses/:courseId/students/:studentId/lessons/:lessonId/complete', async (request, reply) => {
    const input = LessonParams.parse(request.params);
    const outcome = await withConcurrencyRetry(() => recordLessonCompletion(store, clock, input));
    return reply.status(200).send(outcome);
  });

  app.post('/courses/:courseId/students/:studentId/assignments/:assignmentId/submit', async (request, reply) => {
    const input = AssignmentParams.parse(request.params);
    const outcome = await withConcurrencyRetry(() => recordAssignmentSubmission(store, clock, input));
    return reply.status(200).send(outcome);
  });

  app.get('/courses/:courseId/students/:studentId/progress', async (request, reply) => {
    const pair = PairParams.parse(request.params);
    const progress = await getProgress(store, pair);
    if (progress === null) {
      return reply.status(404).send({
        error: 'ProgressNotFound',
        message: `No progress recorded for student '${pair.studentId}' in course '${pair.courseId}'`,
      });
    }
    return reply.status(200).send(progress);
  });
}

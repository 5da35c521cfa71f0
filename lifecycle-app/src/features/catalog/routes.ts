import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { withConcurrencyRetry } from 'lifecycle-event-store';
import type { LifecycleStore } from '../../store.js';
import type { Clock } from '../../domain/clock.js';
import {
  changeCourseContent,
  changeCoursePrice,
  delistCourse,
  getCourseTerms,
  listCourse,
} from './course-terms.js';
import type { CatalogOptions } from './course-terms.js';

const CourseParams = z.object({ courseId: z.string().min(1) });

const ListCourseBody = z.object({
  courseId: z.string().min(1).optional(),
  title: z.string().min(1),
  price: z.number(),
  durationDays: z.number().optional(),
  totalLessons: z.number(),
  totalAssignments: z.number(),
});

const PriceBody = z.object({ price: z.number() });
const ContentBody = z.object({ totalLessons: z.number(), totalAssignments: z.number() });

export async function registerCatalogRoutes(
  app: FastifyInstance,
  store: LifecycleStore,
  clock: Clock,
  options: CatalogOptions,
): Promise<void> {
  app.post('/courses', async (request, reply) => {
    const body = ListCourseBody.parse(request.body);
    const terms = await withConcurrencyRetry(() => listCourse(store, clock, body, options));
    return reply.status(201).send(terms);
  });

  app.get('/courses/:courseId', async (request, reply) => {
    const { courseId } = CourseParams.parse(request.params);
    const terms = await getCourseTerms(store, courseId);
    if (terms === null) {
      return reply.status(404).send({ error: 'CourseNotFoundError', message: `Course '${courseId}' not found` });
    }
    return reply.status(200).send(terms);
  });

  app.put('/courses/:courseId/price', async (request, reply) => {
    const { courseId } = CourseParams.parse(request.params);
    const { price } = PriceBody.parse(request.body);
    await withConcurrencyRetry(() => changeCoursePrice(store, clock, { courseId, price }));
    return reply.status(204).send();
  });

  app.put('/courses/:courseId/content', async (request, reply) => {
    const { courseId } = CourseParams.parse(request.params);
    const body = ContentBody.parse(request.body);
    await withConcurrencyRetry(() => changeCourseContent(store, clock, { courseId, ...body }));
    return reply.status(204).send();
  });

  app.delete('/courses/:courseId', async (request, reply) => {
    const { courseId } = CourseParams.parse(request.params);
    await withConcurrencyRetry(() => delistCourse(store, clock, { courseId }));
    return reply.status(204).send();
  });
}

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { withConcurrencyRetry } from 'lifecycle-event-store';
import type { LifecycleStore } from '../../store.js';
import type { Clock } from '../../domain/clock.js';
import { awardCertificate } from './award-certificate.js';

const PairParams = z.object({ courseId: z.string().min(1), studentId: z.string().min(1) });
const AwardBody = z.object({ certificateType: z.enum(['Excellence', 'Proficiency']) });

export async function registerCertificateRoutes(
  app: FastifyInstance,
  store: LifecycleStore,
  clock: Clock,
): Promise<void> {
  app.post('/courses/:courseId/students/:studentId/certificates', async (request, reply) => {
    const pair = PairParams.parse(request.params);
    const { certificateType } = AwardBody.parse(request.body);
    const certificate = await withConcurrencyRetry(() =>
      awardCertificate(store, clock, { ...pair, certificateType }),
    );
    return reply.status(201).send(certificate);
  });
}

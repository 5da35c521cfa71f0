import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { SemesterPolicy } from './semester-policy.js';
import type { GradingScale } from './grading-scale.js';
import { evaluateAdvancement } from './can-advance.js';

const AdvancementBody = z.object({
  courseId: z.string().min(1),
  currentSemester: z.number().int().positive(),
  credits: z.number().nonnegative(),
  gpa: z.number().nonnegative(),
});

const GpaBody = z.object({
  results: z.array(z.object({ credits: z.number().nonnegative(), percentage: z.number().min(0).max(100) })),
});

export async function registerSemesterGateRoutes(
  app: FastifyInstance,
  policy: SemesterPolicy,
  gradingScale: GradingScale,
): Promise<void> {
  app.post('/semester-advancement', async (request, reply) => {
    const input = AdvancementBody.parse(request.body);
    return reply.status(200).send(evaluateAdvancement(policy, input));
  });

  app.post('/gpa', async (request, reply) => {
    const { results } = GpaBody.parse(request.body);
    return reply.status(200).send({ gpa: gradingScale.computeGpa(results) });
  });
}

import type { LifecycleStore } from '../../store.js';
import type { Clock } from '../../domain/clock.js';
import { CourseNotCompletedError } from '../../domain/errors.js';
import { reducePair } from '../../domain/reducers.js';
import type { Certificate } from '../../domain/reducers.js';
import { pairBoundary, pairLocks } from '../../domain/streams.js';
import { certificateIssued } from './certificate-issuer.js';

export type AwardType = 'Excellence' | 'Proficiency';

export interface AwardCertificateInput {
  studentId: string;
  courseId: string;
  certificateType: AwardType;
}

/**
 * Externally decided awards on top of a completed course. A pair holds at
 * most one certificate of each type; awarding again returns the one it has.
 */
export async function awardCertificate(
  store: LifecycleStore,
  clock: Clock,
  input: AwardCertificateInput,
): Promise<Certificate> {
  const boundary = pairBoundary(input.studentId, input.courseId);
  const { events, version } = await store.load(boundary);
  const { certificates } = reducePair(events);

  if (!certificates.some((c) => c.certificateType === 'Completion')) {
    throw new CourseNotCompletedError(
      `Student '${input.studentId}' has not completed course '${input.courseId}'`,
    );
  }
  const existing = certificates.find((c) => c.certificateType === input.certificateType);
  if (existing !== undefined) return existing;

  const issued = certificateIssued(input.studentId, input.courseId, input.certificateType, clock.now());
  await store.append([issued], {
    query: boundary,
    expectedVersion: version,
    lockKeys: pairLocks(input.studentId, input.courseId),
  });
  return issued.payload;
}

import type { CertificateType, LifecycleEventOf } from '../../domain/events.js';
import { certificateIdFor } from '../../domain/ids.js';
import { crossedCompletion } from '../../domain/progress.js';
import type { Certificate } from '../../domain/reducers.js';

export interface ProgressChange {
  studentId: string;
  courseId: string;
  previousPercentage: number;
  percentage: number;
}

export interface IssuerContext {
  /** Certificates the pair already holds, from the same boundary load. */
  certificates: readonly Certificate[];
  issuedAt: Date;
}

export function certificateUrl(studentId: string, courseId: string, issuedAt: Date, certificateId: string): string {
  return `/certs/${encodeURIComponent(studentId)}/${encodeURIComponent(courseId)}/${issuedAt.getTime()}-${certificateId}.pdf`;
}

export function certificateIssued(
  studentId: string,
  courseId: string,
  certificateType: CertificateType,
  issuedAt: Date,
): LifecycleEventOf<'CertificateIssued'> {
  const certificateId = certificateIdFor(studentId, courseId, certificateType, issuedAt);
  return {
    type: 'CertificateIssued',
    payload: {
      certificateId,
      studentId,
      courseId,
      certificateType,
      issuedAt: issuedAt.toISOString(),
      url: certificateUrl(studentId, courseId, issuedAt, certificateId),
    },
  };
}

/**
 * Completion check run on every progress update, inside the caller's append.
 * Issues only on the transition into the completed range, and never when the
 * pair already holds a Completion certificate.
 */
export function onProgressChanged(
  change: ProgressChange,
  context: IssuerContext,
): LifecycleEventOf<'CertificateIssued'> | null {
  if (!crossedCompletion(change.previousPercentage, change.percentage)) return null;
  if (context.certificates.some((c) => c.certificateType === 'Completion')) return null;
  return certificateIssued(change.studentId, change.courseId, 'Completion', context.issuedAt);
}

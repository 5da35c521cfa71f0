import { v5 as uuidv5, v4 as uuidv4 } from 'uuid';
import type { CertificateType } from './events.js';

// Valid UUID namespaces for deterministic ID generation
export const CERTIFICATE_NAMESPACE = '3b1f6c2e-8d4a-4e7b-9c15-6a2d0f8e4b71';
export const DROPOUT_NAMESPACE = '9e4d2a7c-5f31-4b8e-a6c0-1d7f3e5b9a24';

export function certificateIdFor(
  studentId: string,
  courseId: string,
  certificateType: CertificateType,
  issuedAt: Date,
): string {
  return uuidv5(`${studentId}|${courseId}|${certificateType}|${issuedAt.toISOString()}`, CERTIFICATE_NAMESPACE);
}

export interface DropoutKey {
  studentId: string;
  courseId: string;
  enrollmentDate: string;
  dropoutDate: Date;
  /** 1 for the pair's first withdrawal, 2 for the next, and so on. */
  ordinal: number;
}

export function dropoutIdFor(key: DropoutKey): string {
  return uuidv5(
    `${key.studentId}|${key.courseId}|${key.ordinal}|${key.enrollmentDate}|${key.dropoutDate.toISOString()}`,
    DROPOUT_NAMESPACE,
  );
}

export function newCourseId(): string {
  return uuidv4();
}

import { z } from 'zod';

const id = z.string().min(1);
const timestamp = z.string().datetime();
const count = z.number().int().nonnegative();

export const CERTIFICATE_TYPES = ['Completion', 'Excellence', 'Proficiency'] as const;
export const CertificateTypeSchema = z.enum(CERTIFICATE_TYPES);
export type CertificateType = z.infer<typeof CertificateTypeSchema>;

// ---------------------------------------------------------------------------
// Catalog and identity (external collaborators)
// ---------------------------------------------------------------------------

export const CourseListedPayloadSchema = z.object({
  courseId: id,
  title: z.string(),
  price: z.number(),
  durationDays: z.number().int(),
  totalLessons: count,
  totalAssignments: count,
  listedAt: timestamp,
});

export const CoursePriceChangedPayloadSchema = z.object({
  courseId: id,
  price: z.number(),
  changedAt: timestamp,
});

export const CourseContentChangedPayloadSchema = z.object({
  courseId: id,
  totalLessons: count,
  totalAssignments: count,
  changedAt: timestamp,
});

export const CourseDelistedPayloadSchema = z.object({
  courseId: id,
  delistedAt: timestamp,
});

export const StudentAccountClosedPayloadSchema = z.object({
  studentId: id,
  closedAt: timestamp,
});

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export const StudentEnrolledPayloadSchema = z.object({
  studentId: id,
  courseId: id,
  enrolledAt: timestamp,
});

export const LessonCompletedPayloadSchema = z.object({
  studentId: id,
  courseId: id,
  lessonId: id,
  completedAt: timestamp,
});

export const AssignmentSubmittedPayloadSchema = z.object({
  studentId: id,
  courseId: id,
  assignmentId: id,
  submittedAt: timestamp,
});

/** Carries both percentages so the certificate check can see the transition. */
export const ProgressUpdatedPayloadSchema = z.object({
  studentId: id,
  courseId: id,
  totalLessons: count,
  completedLessons: count,
  totalAssignments: count,
  submittedAssignments: count,
  previousPercentage: z.number().min(0).max(100),
  percentage: z.number().min(0).max(100),
  updatedAt: timestamp,
});

export const CertificateIssuedPayloadSchema = z.object({
  certificateId: z.string().uuid(),
  studentId: id,
  courseId: id,
  certificateType: CertificateTypeSchema,
  issuedAt: timestamp,
  url: z.string(),
});

export const DropoutRecordedPayloadSchema = z.object({
  dropoutId: z.string().uuid(),
  studentId: id,
  courseId: id,
  enrollmentDate: timestamp,
  dropoutDate: timestamp,
  totalCourseDuration: z.number().int().positive(),
  completedDuration: count,
  coursePrice: z.number().nonnegative(),
  refundPercentage: z.union([z.literal(90), z.literal(50), z.literal(25), z.literal(0)]),
  refundAmount: z.number().nonnegative(),
  reason: z.string(),
});

export const StudentUnenrolledPayloadSchema = z.object({
  studentId: id,
  courseId: id,
  unenrolledAt: timestamp,
});

export type CourseListedPayload = z.infer<typeof CourseListedPayloadSchema>;
export type CoursePriceChangedPayload = z.infer<typeof CoursePriceChangedPayloadSchema>;
export type CourseContentChangedPayload = z.infer<typeof CourseContentChangedPayloadSchema>;
export type CourseDelistedPayload = z.infer<typeof CourseDelistedPayloadSchema>;
export type StudentAccountClosedPayload = z.infer<typeof StudentAccountClosedPayloadSchema>;
export type StudentEnrolledPayload = z.infer<typeof StudentEnrolledPayloadSchema>;
export type LessonCompletedPayload = z.infer<typeof LessonCompletedPayloadSchema>;
export type AssignmentSubmittedPayload = z.infer<typeof AssignmentSubmittedPayloadSchema>;
export type ProgressUpdatedPayload = z.infer<typeof ProgressUpdatedPayloadSchema>;
export type CertificateIssuedPayload = z.infer<typeof CertificateIssuedPayloadSchema>;
export type DropoutRecordedPayload = z.infer<typeof DropoutRecordedPayloadSchema>;
export type StudentUnenrolledPayload = z.infer<typeof StudentUnenrolledPayloadSchema>;

/** Codec for every event the application stores. */
export const LifecycleEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('CourseListed'), payload: CourseListedPayloadSchema }),
  z.object({ type: z.literal('CoursePriceChanged'), payload: CoursePriceChangedPayloadSchema }),
  z.object({ type: z.literal('CourseContentChanged'), payload: CourseContentChangedPayloadSchema }),
  z.object({ type: z.literal('CourseDelisted'), payload: CourseDelistedPayloadSchema }),
  z.object({ type: z.literal('StudentAccountClosed'), payload: StudentAccountClosedPayloadSchema }),
  z.object({ type: z.literal('StudentEnrolled'), payload: StudentEnrolledPayloadSchema }),
  z.object({ type: z.literal('LessonCompleted'), payload: LessonCompletedPayloadSchema }),
  z.object({ type: z.literal('AssignmentSubmitted'), payload: AssignmentSubmittedPayloadSchema }),
  z.object({ type: z.literal('ProgressUpdated'), payload: ProgressUpdatedPayloadSchema }),
  z.object({ type: z.literal('CertificateIssued'), payload: CertificateIssuedPayloadSchema }),
  z.object({ type: z.literal('DropoutRecorded'), payload: DropoutRecordedPayloadSchema }),
  z.object({ type: z.literal('StudentUnenrolled'), payload: StudentUnenrolledPayloadSchema }),
]);

export type LifecycleEvent = z.infer<typeof LifecycleEventSchema>;
export type LifecycleEventType = LifecycleEvent['type'];
export type LifecycleEventOf<T extends LifecycleEventType> = Extract<LifecycleEvent, { type: T }>;

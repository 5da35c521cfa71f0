import type {
  CertificateIssuedPayload,
  DropoutRecordedPayload,
  LifecycleEvent,
} from './events.js';
import type { ProgressRecord } from './progress.js';

export type CourseStatus = 'none' | 'listed' | 'delisted';

export interface CourseTerms {
  courseId: string;
  title: string;
  price: number;
  durationDays: number;
  totalLessons: number;
  totalAssignments: number;
}

export type CourseState =
  | { status: 'none' }
  | ({ status: 'listed' | 'delisted' } & CourseTerms);

export function reduceCourse(events: readonly LifecycleEvent[]): CourseState {
  let state: CourseState = { status: 'none' };
  for (const event of events) {
    if (event.type === 'CourseListed') {
      const p = event.payload;
      state = {
        status: 'listed',
        courseId: p.courseId,
        title: p.title,
        price: p.price,
        durationDays: p.durationDays,
        totalLessons: p.totalLessons,
        totalAssignments: p.totalAssignments,
      };
    } else if (state.status === 'none') {
      continue;
    } else if (event.type === 'CoursePriceChanged') {
      const current: Exclude<CourseState, { status: 'none' }> = state;
      state = { ...current, price: event.payload.price };
    } else if (event.type === 'CourseContentChanged') {
      const current: Exclude<CourseState, { status: 'none' }> = state;
      state = {
        ...current,
        totalLessons: event.payload.totalLessons,
        totalAssignments: event.payload.totalAssignments,
      };
    } else if (event.type === 'CourseDelisted') {
      const current: Exclude<CourseState, { status: 'none' }> = state;
      state = { ...current, status: 'delisted' };
    }
  }
  return state;
}

export interface Enrollment {
  studentId: string;
  courseId: string;
  enrolledAt: string;
}

export type Certificate = CertificateIssuedPayload;
export type DropoutRecord = DropoutRecordedPayload;

export interface PairState {
  course: CourseState;
  accountClosed: boolean;
  /** Active enrollment, or null when never enrolled, withdrawn, or cascaded away. */
  enrollment: Enrollment | null;
  completedLessons: ReadonlySet<string>;
  submittedAssignments: ReadonlySet<string>;
  progress: ProgressRecord | null;
  certificates: Certificate[];
  dropouts: DropoutRecord[];
}

/**
 * Folds a pair boundary. Progress and certificates outlive the enrollment:
 * a student who withdraws and re-enrolls keeps what they completed.
 */
export function reducePair(events: readonly LifecycleEvent[]): PairState {
  let enrollment: Enrollment | null = null;
  let accountClosed = false;
  let progress: ProgressRecord | null = null;
  const completedLessons = new Set<string>();
  const submittedAssignments = new Set<string>();
  const certificates: Certificate[] = [];
  const dropouts: DropoutRecord[] = [];

  for (const event of events) {
    switch (event.type) {
      case 'StudentEnrolled':
        enrollment = { ...event.payload };
        break;
      case 'StudentUnenrolled':
      case 'CourseDelisted':
        enrollment = null;
        break;
      case 'StudentAccountClosed':
        enrollment = null;
        accountClosed = true;
        break;
      case 'LessonCompleted':
        completedLessons.add(event.payload.lessonId);
        break;
      case 'AssignmentSubmitted':
        submittedAssignments.add(event.payload.assignmentId);
        break;
      case 'ProgressUpdated': {
        const p = event.payload;
        progress = {
          studentId: p.studentId,
          courseId: p.courseId,
          totalLessons: p.totalLessons,
          completedLessons: p.completedLessons,
          totalAssignments: p.totalAssignments,
          submittedAssignments: p.submittedAssignments,
          percentage: p.percentage,
          lastUpdated: p.updatedAt,
        };
        break;
      }
      case 'CertificateIssued':
        certificates.push(event.payload);
        break;
      case 'DropoutRecorded':
        dropouts.push(event.payload);
        break;
      default:
        break;
    }
  }

  return {
    course: reduceCourse(events),
    accountClosed,
    enrollment,
    completedLessons,
    submittedAssignments,
    progress,
    certificates,
    dropouts,
  };
}

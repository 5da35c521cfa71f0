import { describe, it, expect } from 'vitest';
import { reduceCourse, reducePair } from '../../src/domain/reducers.js';
import type { LifecycleEvent } from '../../src/domain/events.js';

const at = '2025-01-06T09:00:00.000Z';

const listed: LifecycleEvent = {
  type: 'CourseListed',
  payload: {
    courseId: 'c1',
    title: 'Distributed Systems',
    price: 1000,
    durationDays: 180,
    totalLessons: 10,
    totalAssignments: 2,
    listedAt: at,
  },
};

function enrolled(studentId = 's1'): LifecycleEvent {
  return { type: 'StudentEnrolled', payload: { studentId, courseId: 'c1', enrolledAt: at } };
}

function lesson(lessonId: string): LifecycleEvent {
  return { type: 'LessonCompleted', payload: { studentId: 's1', courseId: 'c1', lessonId, completedAt: at } };
}

const unenrolled: LifecycleEvent = {
  type: 'StudentUnenrolled',
  payload: { studentId: 's1', courseId: 'c1', unenrolledAt: at },
};

describe('reduceCourse', () => {
  it('returns none for empty events', () => {
    expect(reduceCourse([])).toEqual({ status: 'none' });
  });

  it('returns the listed terms', () => {
    expect(reduceCourse([listed])).toEqual({
      status: 'listed',
      courseId: 'c1',
      title: 'Distributed Systems',
      price: 1000,
      durationDays: 180,
      totalLessons: 10,
      totalAssignments: 2,
    });
  });

  it('applies price and content changes in order', () => {
    const state = reduceCourse([
      listed,
      { type: 'CoursePriceChanged', payload: { courseId: 'c1', price: 800, changedAt: at } },
      { type: 'CourseContentChanged', payload: { courseId: 'c1', totalLessons: 12, totalAssignments: 0, changedAt: at } },
      { type: 'CoursePriceChanged', payload: { courseId: 'c1', price: 750, changedAt: at } },
    ]);
    expect(state).toMatchObject({ status: 'listed', price: 750, totalLessons: 12, totalAssignments: 0 });
  });

  it('keeps the terms of a delisted course', () => {
    const state = reduceCourse([listed, { type: 'CourseDelisted', payload: { courseId: 'c1', delistedAt: at } }]);
    expect(state).toMatchObject({ status: 'delisted', price: 1000 });
  });

  it('ignores changes to a course that was never listed', () => {
    expect(reduceCourse([{ type: 'CoursePriceChanged', payload: { courseId: 'c1', price: 5, changedAt: at } }]))
      .toEqual({ status: 'none' });
  });
});

describe('reducePair', () => {
  it('has no enrollment, progress or certificates for empty events', () => {
    const state = reducePair([]);
    expect(state.enrollment).toBeNull();
    expect(state.progress).toBeNull();
    expect(state.certificates).toEqual([]);
    expect(state.accountClosed).toBe(false);
  });

  it('tracks the active enrollment', () => {
    expect(reducePair([listed, enrolled()]).enrollment).toEqual({ studentId: 's1', courseId: 'c1', enrolledAt: at });
    expect(reducePair([listed, enrolled(), unenrolled]).enrollment).toBeNull();
  });

  it('keeps completed lessons across withdrawal and re-enrollment', () => {
    const state = reducePair([listed, enrolled(), lesson('l1'), lesson('l2'), unenrolled, enrolled(), lesson('l1')]);
    expect(state.enrollment).not.toBeNull();
    expect([...state.completedLessons]).toEqual(['l1', 'l2']);
  });

  it('ends the enrollment when the course is delisted', () => {
    const state = reducePair([
      listed,
      enrolled(),
      { type: 'CourseDelisted', payload: { courseId: 'c1', delistedAt: at } },
    ]);
    expect(state.enrollment).toBeNull();
    expect(state.course.status).toBe('delisted');
  });

  it('ends the enrollment and flags the account when it is closed', () => {
    const state = reducePair([listed, enrolled(), { type: 'StudentAccountClosed', payload: { studentId: 's1', closedAt: at } }]);
    expect(state.enrollment).toBeNull();
    expect(state.accountClosed).toBe(true);
  });

  it('takes progress from the latest update', () => {
    const state = reducePair([
      listed,
      enrolled(),
      {
        type: 'ProgressUpdated',
        payload: {
          studentId: 's1',
          courseId: 'c1',
          totalLessons: 10,
          completedLessons: 1,
          totalAssignments: 2,
          submittedAssignments: 0,
          previousPercentage: 0,
          percentage: 8.33,
          updatedAt: at,
        },
      },
    ]);
    expect(state.progress).toEqual({
      studentId: 's1',
      courseId: 'c1',
      totalLessons: 10,
      completedLessons: 1,
      totalAssignments: 2,
      submittedAssignments: 0,
      percentage: 8.33,
      lastUpdated: at,
    });
  });

  it('collects certificates and dropouts', () => {
    const state = reducePair([
      {
        type: 'CertificateIssued',
        payload: {
          certificateId: '6f1c1c56-5a8e-5c8f-9d3b-0c4a2e1f7b90',
          studentId: 's1',
          courseId: 'c1',
          certificateType: 'Completion',
          issuedAt: at,
          url: '/certs/s1/c1/1736154000000-6f1c1c56-5a8e-5c8f-9d3b-0c4a2e1f7b90.pdf',
        },
      },
    ]);
    expect(state.certificates.map((c) => c.certificateType)).toEqual(['Completion']);
    expect(state.dropouts).toEqual([]);
  });
});

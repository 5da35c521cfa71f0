import type { LifecycleStore } from '../../store.js';
import type { Clock } from '../../domain/clock.js';
import { CourseAlreadyListedError, CourseNotFoundError, InvalidCourseTermsError } from '../../domain/errors.js';
import { newCourseId } from '../../domain/ids.js';
import { reduceCourse } from '../../domain/reducers.js';
import type { CourseTerms } from '../../domain/reducers.js';
import { courseLocks, courseStream } from '../../domain/streams.js';

/** Used when a course is listed without an explicit duration. */
export const DEFAULT_COURSE_DURATION_DAYS = 180;

function assertPrice(price: number): void {
  if (!Number.isFinite(price) || price < 0) {
    throw new InvalidCourseTermsError(`Price must be a non-negative amount, got ${price}`);
  }
}

function assertContent(totalLessons: number, totalAssignments: number): void {
  for (const [name, value] of [['totalLessons', totalLessons], ['totalAssignments', totalAssignments]] as const) {
    if (!Number.isInteger(value) || value < 0) {
      throw new InvalidCourseTermsError(`${name} must be a non-negative integer, got ${value}`);
    }
  }
}

export interface ListCourseInput {
  courseId?: string | undefined;
  title: string;
  price: number;
  durationDays?: number | undefined;
  totalLessons: number;
  totalAssignments: number;
}

export interface CatalogOptions {
  defaultDurationDays: number;
}

export async function listCourse(
  store: LifecycleStore,
  clock: Clock,
  input: ListCourseInput,
  options: CatalogOptions = { defaultDurationDays: DEFAULT_COURSE_DURATION_DAYS },
): Promise<CourseTerms> {
  const courseId = input.courseId ?? newCourseId();
  const durationDays = input.durationDays ?? options.defaultDurationDays;
  assertPrice(input.price);
  assertContent(input.totalLessons, input.totalAssignments);
  if (!Number.isInteger(durationDays) || durationDays <= 0) {
    throw new InvalidCourseTermsError(`durationDays must be a positive integer, got ${durationDays}`);
  }

  const boundary = courseStream(courseId);
  const { events, version } = await store.load(boundary);
  if (reduceCourse(events).status !== 'none') {
    throw new CourseAlreadyListedError(`Course '${courseId}' is already listed`);
  }

  const terms: CourseTerms = {
    courseId,
    title: input.title,
    price: input.price,
    durationDays,
    totalLessons: input.totalLessons,
    totalAssignments: input.totalAssignments,
  };
  await store.append(
    [{ type: 'CourseListed', payload: { ...terms, listedAt: clock.now().toISOString() } }],
    { query: boundary, expectedVersion: version, lockKeys: courseLocks(courseId) },
  );
  return terms;
}

async function loadListedCourse(store: LifecycleStore, courseId: string) {
  const boundary = courseStream(courseId);
  const { events, version } = await store.load(boundary);
  const course = reduceCourse(events);
  if (course.status !== 'listed') {
    throw new CourseNotFoundError(`Course '${courseId}' not found`);
  }
  return { boundary, version, course };
}

export async function changeCoursePrice(
  store: LifecycleStore,
  clock: Clock,
  input: { courseId: string; price: number },
): Promise<void> {
  assertPrice(input.price);
  const { boundary, version } = await loadListedCourse(store, input.courseId);
  await store.append(
    [{
      type: 'CoursePriceChanged',
      payload: { courseId: input.courseId, price: input.price, changedAt: clock.now().toISOString() },
    }],
    { query: boundary, expectedVersion: version, lockKeys: courseLocks(input.courseId) },
  );
}

export async function changeCourseContent(
  store: LifecycleStore,
  clock: Clock,
  input: { courseId: string; totalLessons: number; totalAssignments: number },
): Promise<void> {
  assertContent(input.totalLessons, input.totalAssignments);
  const { boundary, version } = await loadListedCourse(store, input.courseId);
  await store.append(
    [{
      type: 'CourseContentChanged',
      payload: {
        courseId: input.courseId,
        totalLessons: input.totalLessons,
        totalAssignments: input.totalAssignments,
        changedAt: clock.now().toISOString(),
      },
    }],
    { query: boundary, expectedVersion: version, lockKeys: courseLocks(input.courseId) },
  );
}

/**
 * Removes a course from the catalog. Every enrollment in it ends with the
 * delisting; progress, certificates and dropout records stay.
 */
export async function delistCourse(
  store: LifecycleStore,
  clock: Clock,
  input: { courseId: string },
): Promise<void> {
  const { boundary, version } = await loadListedCourse(store, input.courseId);
  await store.append(
    [{ type: 'CourseDelisted', payload: { courseId: input.courseId, delistedAt: clock.now().toISOString() } }],
    { query: boundary, expectedVersion: version, lockKeys: courseLocks(input.courseId) },
  );
}

/** Current terms of a listed course; null when unknown or delisted. */
export async function getCourseTerms(store: LifecycleStore, courseId: string): Promise<CourseTerms | null> {
  const { events } = await store.load(courseStream(courseId));
  const course = reduceCourse(events);
  if (course.status !== 'listed') return null;
  return {
    courseId: course.courseId,
    title: course.title,
    price: course.price,
    durationDays: course.durationDays,
    totalLessons: course.totalLessons,
    totalAssignments: course.totalAssignments,
  };
}

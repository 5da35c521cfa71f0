export class NotEnrolledError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotEnrolledError';
  }
}

export class AlreadyEnrolledError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AlreadyEnrolledError';
  }
}

export class NoPolicyDefinedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NoPolicyDefinedError';
  }
}

/**
 * A derived value (percentage, refund) fell outside its valid range.
 * Indicates a logic or data bug; the operation aborts without writing.
 */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

export class CourseNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CourseNotFoundError';
  }
}

export class CourseAlreadyListedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CourseAlreadyListedError';
  }
}

export class InvalidCourseTermsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidCourseTermsError';
  }
}

export class StudentAccountClosedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StudentAccountClosedError';
  }
}

export class CourseNotCompletedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CourseNotCompletedError';
  }
}

export class InvalidPolicyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidPolicyError';
  }
}

export class InvalidScoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidScoreError';
  }
}

import { ConflictError } from './errors';
import type { CourseKey, CourseRecord } from './schemas/course';

export function sameCourseKey(a: CourseKey, b: CourseKey): boolean {
  return a.course_code === b.course_code && a.semester === b.semester && a.year === b.year;
}

/**
 * Rejects `candidate` when another stored course already holds its
 * (course_code, semester, year) key. `excludeId` is the id of the course
 * being updated, which may keep its own key.
 */
export function assertUniqueCourseKey(
  courses: Iterable<CourseRecord>,
  candidate: CourseKey,
  excludeId?: string,
): void {
  for (const course of courses) {
    if (course.id === excludeId) continue;
    if (sameCourseKey(course, candidate)) {
      throw new ConflictError(
        `Course ${candidate.course_code} already exists for ${candidate.semester} ${candidate.year}`,
      );
    }
  }
}

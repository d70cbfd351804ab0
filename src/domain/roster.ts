import type { AccessStatus, Result, Student } from "../types";

/**
 * Normalize an access code for comparison
 *
 * Spreadsheet-backed stores coerce numeric codes, so "1234" may come back as
 * 1234, "1234.0" or " 1234.00 ". All of those normalize to "1234".
 *
 * @param value - Stored or submitted code
 * @returns Trimmed code without a trailing zero fraction
 */
export const normalizeAccessCode = (value: string | number): string => {
    return String(value).trim().replace(/\.0+$/, '');
}

/**
 * Full display name, first name then last name
 */
export const fullName = (student: Pick<Student, 'firstName' | 'lastName'>): string => {
    return `${student.firstName.trim()} ${student.lastName.trim()}`;
}

/**
 * Resolve a (last name, first name) pair against the roster
 *
 * Matching is exact and case-sensitive; only surrounding whitespace is ignored.
 * More than one match is a data problem and is reported, never resolved by picking one.
 *
 * @param students - Current `Students` collection
 * @param lastName - Last name as typed
 * @param firstName - First name as typed
 * @returns The single matching student, NOT_FOUND or AMBIGUOUS_RECORD
 */
export const findStudent = (students: Student[], lastName: string, firstName: string): Result<Student> => {
    const last = lastName.trim();
    const first = firstName.trim();
    const matches = students.filter(s => s.lastName.trim() === last && s.firstName.trim() === first);

    const [student] = matches;
    if (!student) return { ok: false, error: { code: 'NOT_FOUND' } };
    if (matches.length > 1) return { ok: false, error: { code: 'AMBIGUOUS_RECORD', matches: matches.length } };
    return { ok: true, value: student };
}

/**
 * Compare a submitted code with the student's code, both normalized
 *
 * An empty submission never matches.
 */
export const accessCodeMatches = (student: Student, candidate: string): boolean => {
    const submitted = normalizeAccessCode(candidate);
    if (!submitted) return false;
    return normalizeAccessCode(student.accessCode) === submitted;
}

/**
 * Access gate outcome for a submitted code
 *
 * An empty submission is PENDING (not yet attempted), never DENIED.
 */
export const checkAccessCode = (student: Student, candidate: string): AccessStatus => {
    if (!normalizeAccessCode(candidate)) return 'PENDING';
    return accessCodeMatches(student, candidate) ? 'GRANTED' : 'DENIED';
}

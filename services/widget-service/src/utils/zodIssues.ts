import { ZodIssue } from 'zod';

/** `path: message` pairs, `root` naming issues on the value itself. */
export function formatIssues(issues: ZodIssue[], root: string): string {
  return issues
    .map((issue) => `${issue.path.join('.') || root}: ${issue.message}`)
    .join('; ');
}

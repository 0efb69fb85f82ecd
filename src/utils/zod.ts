import type { ZodIssue } from 'zod';

const formatIssue = (issue: ZodIssue) => {
  const key = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${key}: ${issue.message}`;
};

export const formatSchemaIssues = (issues: ZodIssue[]): string =>
  issues.map((issue) => `- ${formatIssue(issue)}`).join('\n');

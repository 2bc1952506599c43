/**
 * Input validation for interactive prompts
 */

import { directoryNameProblem } from '../../core/project-config.js';

const MAX_NAME_LENGTH = 100;

/**
 * Validate a project name typed at the prompt. Spaces are fine ("My API"
 * becomes my-api); anything that would leave the slug pointing outside the
 * working directory is not.
 */
export function validateProjectName(value: string | undefined): string | undefined {
  if (!value || value.trim().length === 0) {
    return 'Project name is required';
  }

  if (value.length > MAX_NAME_LENGTH) {
    return `Project name must be at most ${MAX_NAME_LENGTH} characters long`;
  }

  return directoryNameProblem(value);
}

import { UniqueConstraintError } from 'sequelize';

/** True when the store rejected a write because a unique key already exists. */
export const isUniqueConstraintError = (
  error: unknown,
): error is UniqueConstraintError => error instanceof UniqueConstraintError;

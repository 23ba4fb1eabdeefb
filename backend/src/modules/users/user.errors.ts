/**
 * backend/src/modules/users/user.errors.ts
 *
 * Users module error semantics. AppError is the transport primitive.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const UserErrors = {
  /** Target of an admin action does not exist. */
  notFound(meta?: AppErrorMeta) {
    return AppError.notFound('User not found.', meta);
  },

  /** Password change: the current password did not verify. */
  wrongCurrentPassword(meta?: AppErrorMeta) {
    return AppError.validationError('Current password is incorrect.', meta);
  },

  /** Token is valid but its subject was deleted. Treated as unauthenticated. */
  subjectGone(meta?: AppErrorMeta) {
    return AppError.unauthenticated('Authentication required', meta);
  },
} as const;

/**
 * backend/src/shared/logger/pii.ts
 *
 * Log-safe projections of personal data. Emails never reach the logs in full;
 * the domain is enough to spot a misbehaving client or a bulk signup.
 */

/** `Ada@Example.COM` → `example.com`; null when there is no domain part. */
export function emailDomain(email: string): string | null {
  const at = email.lastIndexOf('@');
  if (at < 0 || at === email.length - 1) return null;
  return email.slice(at + 1).toLowerCase();
}

/**
 * Sanitize an STS role session name.
 * AWS allows 2-64 chars from [A-Za-z0-9_+=,.@-].
 */
export function sanitizeRoleSessionName(name: string): string {
  const sanitized = name.replace(/[^\w+=,.@-]/g, "-").substring(0, 64);
  if (sanitized.length < 2) {
    throw new Error(`Invalid role session name: "${name}"`);
  }
  return sanitized;
}

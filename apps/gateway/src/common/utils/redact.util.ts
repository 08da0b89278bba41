// src/common/utils/redact.util.ts

/**
 * Shorten a subject id for log lines.
 * Identities are never written to logs in full.
 */
export function maskSubject(sub?: string | null): string {
  if (!sub) return '-';
  return sub.length <= 8 ? `${sub.slice(0, 2)}…` : `${sub.slice(0, 8)}…`;
}

/** Collapse whitespace and cut SQL text to `max` characters for logs and errors. */
export function truncateSql(sql: string, max = 100): string {
  const flat = sql.replace(/\s+/g, ' ').trim();
  return flat.length > max ? `${flat.slice(0, max)}...` : flat;
}

const RATE_LIMIT_PATTERNS: readonly RegExp[] = [
  /rate.?limit/i,
  /too many requests/i,
  /429/,
  /quota.?exceeded/i,
  /resource.?exhausted/i,
  /overloaded/i,
  /retry.?after/i,
  /tokens?.?per.?min/i,
  /requests?.?per.?min/i,
];

const RETRY_AFTER_PATTERN = /retry.?after[:\s]+(\d+(?:\.\d+)?)/i;

function combine(stdout: string, stderr: string): string {
  return `${stdout}\n${stderr}`;
}

export function isRateLimited(stdout: string, stderr: string): boolean {
  const combined = combine(stdout, stderr);
  return RATE_LIMIT_PATTERNS.some((pattern) => pattern.test(combined));
}

/** Seconds the backing service asked us to wait, or null when it didn't say. */
export function extractRetryAfter(stdout: string, stderr: string): number | null {
  const match = RETRY_AFTER_PATTERN.exec(combine(stdout, stderr));
  return match ? Number.parseFloat(match[1]) : null;
}

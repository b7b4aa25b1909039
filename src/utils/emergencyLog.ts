/**
 * Emergency logging utility for critical failures when the winston logger is
 * unavailable or has itself failed. Writes straight to stderr; stdout carries
 * protocol frames and is never touched.
 */

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error !== undefined && error !== null) {
    return 'Non-string error occurred';
  }
  return '';
}

export function formatEmergencyLine(
  level: 'WARN' | 'ERROR',
  message: string,
  error?: unknown
): string {
  const timestamp = new Date().toISOString();
  const errorStr = describeError(error);
  return errorStr
    ? `${timestamp} [${level}] ${message}: ${errorStr}\n`
    : `${timestamp} [${level}] ${message}\n`;
}

export function emergencyWarn(message: string, error?: unknown): void {
  process.stderr.write(formatEmergencyLine('WARN', message, error));
}

/**
 * Used for failures that end the process
 */
export function emergencyError(message: string, error?: unknown): void {
  process.stderr.write(formatEmergencyLine('ERROR', message, error));
}

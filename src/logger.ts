/**
 * Structured logging for json-to-struct
 *
 * Debug and warning lines are only printed when JSON_TO_STRUCT_DEBUG=1,
 * so stdout stays reserved for generated code and stderr for failures.
 */

export type LogCategory = 'decode' | 'inference' | 'render' | 'config' | 'cli';

function isDebugEnabled(): boolean {
  return process.env.JSON_TO_STRUCT_DEBUG === '1';
}

function writeLine(level: 'DEBUG' | 'WARN' | 'ERROR', category: LogCategory, message: string): void {
  const timestamp = new Date().toISOString();
  console.error(`[${timestamp}] [${level}] [${category}] ${message}`);
}

/**
 * Log a debug message
 *
 * @example
 * ```typescript
 * logDebug('inference', 'Inferred struct', { name: 'Foo', fields: 3 });
 * ```
 */
export function logDebug(category: LogCategory, message: string, metadata?: Record<string, unknown>): void {
  if (!isDebugEnabled()) return;
  writeLine('DEBUG', category, message);
  if (metadata) {
    console.error(JSON.stringify(metadata, null, 2));
  }
}

/**
 * Log a warning (non-critical, e.g. a field that fell back to the placeholder type)
 */
export function logWarning(category: LogCategory, message: string, error?: Error): void {
  if (!isDebugEnabled()) return;
  writeLine('WARN', category, message);
  if (error) {
    console.error(`Error: ${error.message}`);
  }
}

/**
 * Log an error (critical failure). Always printed.
 */
export function logError(category: LogCategory, message: string, error?: Error): void {
  writeLine('ERROR', category, message);
  if (error) {
    console.error(`Error: ${error.message}`);
    if (error.stack) {
      console.error(error.stack);
    }
  }
}

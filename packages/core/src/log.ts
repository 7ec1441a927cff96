export type Logger = {
  info(event: string, payload: Record<string, unknown>): void;
  error(event: string, payload: Record<string, unknown>): void;
};

/**
 * Format an event name and associated payload into a structured JSON log string.
 *
 * @returns A JSON string containing `ts` (ISO timestamp), `event`, and `payload`
 */
export function toStructuredLog(event: string, payload: Record<string, unknown>): string {
  return JSON.stringify({ ts: new Date().toISOString(), event, payload });
}

export function logInfo(event: string, payload: Record<string, unknown>): void {
  // eslint-disable-next-line no-console
  console.log(toStructuredLog(event, payload));
}

export function logError(event: string, payload: Record<string, unknown>): void {
  // eslint-disable-next-line no-console
  console.error(toStructuredLog(event, payload));
}

export const consoleLogger: Logger = {
  info: logInfo,
  error: logError
};

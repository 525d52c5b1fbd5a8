/**
 * Log port.
 * Receives trace messages from case selection; structured detail goes in `data`.
 * Where no port is installed, nothing is logged and no trace data is built.
 */
export type LogPort = (msg: string, data?: unknown) => void;

export const consoleLog: LogPort = (msg, data) => {
  if (data === undefined) console.log(msg);
  else console.log(msg, data);
};

/** Collects messages in memory, for tests and diagnostics dumps. */
export function memoryLog(): LogPort & { entries: { msg: string; data?: unknown }[] } {
  const entries: { msg: string; data?: unknown }[] = [];
  const log = (msg: string, data?: unknown) => {
    entries.push(data === undefined ? { msg } : { msg, data });
  };
  return Object.assign(log, { entries });
}

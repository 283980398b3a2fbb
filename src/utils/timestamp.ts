function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Compact local timestamp used in transcript, report and instance names,
 * e.g. 20261018-094501. Only digits and a dash, so it is a legal part of
 * both file and container names.
 */
export function formatTimestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

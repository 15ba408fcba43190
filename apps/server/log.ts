export function formatLogLine(message: string, source: string, now: Date = new Date()): string {
  const formattedTime = now.toLocaleTimeString("en-US", {
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
  return `${formattedTime} [${source}] ${message}`;
}

export function log(message: string, source = "server") {
  console.log(formatLogLine(message, source));
}

export function logError(message: string, error: unknown, source = "server") {
  const detail = error instanceof Error ? error.stack ?? error.message : String(error);
  console.error(formatLogLine(`${message}: ${detail}`, source));
}

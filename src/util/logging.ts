/**
 * Application event logging.
 *
 * Events are written as `[component] event` followed by a flat detail
 * object. Only log counts, file paths, policy names and other values the
 * tool itself produced; never log file contents.
 */

export type LogLevel = "info" | "silent";

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Log an application event with known-safe details
 * @param component - Component name (e.g., "loader", "differ", "reporter")
 * @param event - Event name (e.g., "loaded", "diffed", "written")
 */
export function logApplicationEvent(
  component: string,
  event: string,
  details?: Record<string, string | number | boolean>
): void {
  if (currentLevel === "silent") return;

  const logEntry = {
    component,
    event,
    timestamp: new Date().toISOString(),
    ...details,
  };
  console.log(`[${component}] ${event}`, logEntry);
}

/**
 * One JSON line per reply event; failures go to stderr.
 */

export type BotLogEvent =
  | "capabilities.probed"
  | "message.routed"
  | "command.succeeded"
  | "command.failed";

export type BotLogData = {
  event: BotLogEvent;
  command?: string;
  duration_ms?: number;
  error_message?: string;
  [key: string]: unknown; // event-specific fields
};

export type BotLogger = (data: BotLogData) => void;

/**
 * Emit a structured log entry, one JSON line per event.
 * Failures go to stderr so they survive `> replies.txt`.
 */
export const botLog: BotLogger = (data) => {
  const logEntry = {
    timestamp: new Date().toISOString(),
    ...data,
  };

  if (data.event.endsWith(".failed")) {
    console.error(JSON.stringify(logEntry));
  } else {
    console.log(JSON.stringify(logEntry));
  }
};

export const silentLogger: BotLogger = () => {};

/**
 * Convenience helpers for common events.
 */
export function botLogHelpers(log: BotLogger) {
  return {
    capabilitiesProbed(params: { available: string[]; unavailable: string[] }): void {
      log({
        event: "capabilities.probed",
        available: params.available,
        unavailable: params.unavailable,
      });
    },

    messageRouted(params: { command: string; slash: boolean }): void {
      log({
        event: "message.routed",
        command: params.command,
        slash: params.slash,
      });
    },

    commandSucceeded(params: { command: string; duration_ms: number }): void {
      log({
        event: "command.succeeded",
        command: params.command,
        duration_ms: params.duration_ms,
      });
    },

    commandFailed(params: {
      command: string;
      duration_ms: number;
      error_message: string;
    }): void {
      log({
        event: "command.failed",
        command: params.command,
        duration_ms: params.duration_ms,
        error_message: params.error_message,
      });
    },
  };
}

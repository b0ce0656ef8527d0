const PREFIX = "[chess-engine]";

export interface Logger {
  readonly enabled: boolean;
  debug(message: string, details?: unknown): void;
}

export function createLogger(scope: string, enabled: boolean): Logger {
  const tag = `${PREFIX} [${scope}]`;
  return {
    enabled,
    debug(message: string, details?: unknown): void {
      if (!enabled) return;
      if (details === undefined) {
        // eslint-disable-next-line no-console
        console.log(`${tag} ${message}`);
      } else {
        // eslint-disable-next-line no-console
        console.log(`${tag} ${message}`, details);
      }
    },
  };
}

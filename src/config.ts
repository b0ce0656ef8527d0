export interface EngineConfig {
  /** Debug logging of applied/rejected moves and status changes. */
  log: boolean;
  /** Assert one king per colour after every applied move. */
  checkInvariants: boolean;
}

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  return {
    log: env.CHESS_ENGINE_LOG === "1",
    checkInvariants: env.CHESS_ENGINE_CHECK_INVARIANTS !== "0",
  };
}

export function resolveEngineConfig(overrides?: Partial<EngineConfig>, env?: NodeJS.ProcessEnv): EngineConfig {
  return { ...loadEngineConfig(env), ...overrides };
}

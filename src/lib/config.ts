export interface CliConfig {
  verbose: boolean;
}

// Values come from the environment (and .env, loaded by the entry point).
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  return {
    verbose: env.VERBOSE === '1',
  };
}

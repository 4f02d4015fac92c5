import dotenv from 'dotenv';

/** Load `.env` from the working directory. Only the CLI calls this; library users own their environment. */
export function loadDotenv(path?: string): void {
  dotenv.config(path ? { path } : {});
}

/** Trimmed value of an environment variable, or undefined when unset or blank. */
export function readEnv(name: string, source: NodeJS.ProcessEnv = process.env): string | undefined {
  const value = source[name]?.trim();
  return value ? value : undefined;
}

export const env = {
  get proxy(): string | undefined {
    return readEnv('LINGOPIPE_PROXY');
  },
  get logLevel(): string {
    return readEnv('LINGOPIPE_LOG_LEVEL') ?? 'warn';
  },
  /** Alternate models.yaml */
  get modelsPath(): string | undefined {
    return readEnv('LINGOPIPE_MODELS');
  },
  /** Alternate prompts.yaml */
  get promptsPath(): string | undefined {
    return readEnv('LINGOPIPE_PROMPTS');
  },
};

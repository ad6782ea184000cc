/**
 * CLI argument parsing and validation types
 */

export interface CliOptions {
  outRoot: string;
  creds: string;
  maxPhotos?: number;
  delayMs: number;
  timeoutMs: number;
  maxAttempts: number;
  headless?: boolean;
  verbose?: boolean;
}

export type CliAction = (username: string, options: CliOptions) => Promise<void>;

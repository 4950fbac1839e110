import path from 'path';
import dotenv from 'dotenv';
import logger from './logger.js';

class EnvironmentManager {
  private static instance: EnvironmentManager | null = null;
  private initialized = false;

  private constructor() {
    this.loadEnv();
  }

  private loadEnv() {
    if (this.initialized) return;

    // First load the base .env file
    const baseEnvPath = path.resolve(process.cwd(), '.env');
    logger.debug(`Loading base environment variables from: ${baseEnvPath}`);
    dotenv.config({ path: baseEnvPath });

    // Then load .env.local which overrides base values
    const localEnvPath = path.resolve(process.cwd(), '.env.local');
    const localResult = dotenv.config({ path: localEnvPath, override: true });

    if (localResult.error) {
      logger.debug('No .env.local found, using base environment only');
    }

    this.initialized = true;
  }

  /** Throws if any of the named variables is missing or empty. */
  public requireVars(names: string[]): void {
    const missingVars = names.filter(name => !process.env[name]);

    if (missingVars.length > 0) {
      throw new Error(`Missing required environment variables: ${missingVars.join(', ')}`);
    }
  }

  public getString(name: string, defaultValue?: string): string {
    const value = process.env[name];
    if (value === undefined || value === '') {
      if (defaultValue === undefined) {
        throw new Error(`Environment variable ${name} is not defined`);
      }
      return defaultValue;
    }
    return value;
  }

  public getNumber(name: string, defaultValue?: number): number {
    const value = process.env[name];
    if (value === undefined || value === '') {
      if (defaultValue === undefined) {
        throw new Error(`Environment variable ${name} is not defined`);
      }
      return defaultValue;
    }
    const num = Number(value);
    if (isNaN(num)) {
      throw new Error(`Environment variable ${name} is not a number`);
    }
    return num;
  }

  public static getInstance(): EnvironmentManager {
    if (!EnvironmentManager.instance) {
      EnvironmentManager.instance = new EnvironmentManager();
    }
    return EnvironmentManager.instance;
  }
}

export type { EnvironmentManager };

// Create env manager instance lazily
let envManagerInstance: EnvironmentManager | null = null;

export function getEnv(): EnvironmentManager {
  if (!envManagerInstance) {
    envManagerInstance = EnvironmentManager.getInstance();
  }
  return envManagerInstance;
}

export default getEnv;

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import process from 'process';
import chalk from 'chalk';
import { FieldcheckConfigSchema, type ConfigKey } from './schemas/validation.js';
import type { FieldcheckConfig } from './types/common.js';
import { sanitizeError } from './utils/security.js';
import { ErrorType } from './types/error-handler.js';
import { withErrorHandling, SecureError } from './utils/error-handler.js';
import {
  CONFIG_DIR as CONFIG_DIR_NAME,
  CONFIG_FILE as CONFIG_FILE_NAME,
  CONFIG_FILE_MODE,
  CONFIG_DIR_MODE,
  CONFIG_ENV_VARS,
  DEFAULT_CONFIG,
} from './constants/config.js';
import { WARNING_MESSAGES } from './constants/messages.js';

const CONFIG_DIR = path.join(os.homedir(), CONFIG_DIR_NAME);
const CONFIG_FILE = path.join(CONFIG_DIR, CONFIG_FILE_NAME);

export const formatIssues = (
  issues: Array<{ path: Array<string | number>; message: string }>
): string =>
  issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join(', ');

/**
 * Reads the supported environment overrides. Unset or unparseable variables
 * are skipped; the values are validated together with the file config.
 */
export const readEnvOverrides = (env: NodeJS.ProcessEnv): Record<string, unknown> => {
  const overrides: Record<string, unknown> = {};

  const timeout = env[CONFIG_ENV_VARS.dnsTimeoutMs];
  if (timeout !== undefined && timeout.trim() !== '' && !isNaN(Number(timeout))) {
    overrides.dnsTimeoutMs = Number(timeout);
  }

  const checkDomain = env[CONFIG_ENV_VARS.checkEmailDomain]?.toLowerCase();
  if (checkDomain === 'true' || checkDomain === 'false') {
    overrides.checkEmailDomain = checkDomain === 'true';
  }

  const region = env[CONFIG_ENV_VARS.phoneRegion];
  if (region) {
    overrides.phoneRegion = region;
  }

  return overrides;
};

/**
 * Merges file config and environment overrides over the defaults. The file
 * is validated on its own first so that a bad file never masks a good
 * environment, and vice versa.
 */
export const resolveConfig = (fileConfig: unknown, env: NodeJS.ProcessEnv): FieldcheckConfig => {
  const fromFile = FieldcheckConfigSchema.partial().safeParse(fileConfig ?? {});
  if (!fromFile.success) {
    console.warn(
      chalk.yellow(WARNING_MESSAGES.INVALID_CONFIG_FILE),
      formatIssues(fromFile.error.issues)
    );
  }
  const base: FieldcheckConfig = { ...DEFAULT_CONFIG, ...(fromFile.success ? fromFile.data : {}) };

  const fromEnv = FieldcheckConfigSchema.partial().safeParse(readEnvOverrides(env));
  if (!fromEnv.success) {
    console.warn(
      chalk.yellow(WARNING_MESSAGES.INVALID_ENV_OVERRIDES),
      formatIssues(fromEnv.error.issues)
    );
    return base;
  }

  return { ...base, ...fromEnv.data };
};

export class ConfigManager {
  private static instance: ConfigManager;
  private config: FieldcheckConfig;
  // Values as stored on disk, without environment overrides
  private fileConfig: Partial<FieldcheckConfig>;

  private constructor() {
    this.fileConfig = this.loadConfigFile();
    this.config = resolveConfig(this.fileConfig, process.env);
  }

  public static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  private readonly loadConfigFile = (): Partial<FieldcheckConfig> => {
    try {
      if (fs.existsSync(CONFIG_FILE)) {
        const configData = fs.readFileSync(CONFIG_FILE, 'utf-8');
        const result = FieldcheckConfigSchema.partial().safeParse(JSON.parse(configData));
        if (result.success) {
          return result.data;
        }
        console.warn(
          chalk.yellow(WARNING_MESSAGES.INVALID_CONFIG_FILE),
          formatIssues(result.error.issues)
        );
      }
    } catch (error) {
      console.warn(chalk.yellow(WARNING_MESSAGES.CONFIG_LOAD_FAILED), sanitizeError(error));
    }

    return {};
  };

  private readonly writeConfigFile = async (): Promise<void> => {
    await withErrorHandling(
      async (): Promise<void> => {
        if (!fs.existsSync(CONFIG_DIR)) {
          fs.mkdirSync(CONFIG_DIR, { recursive: true, mode: CONFIG_DIR_MODE });
        }

        await fs.promises.writeFile(CONFIG_FILE, JSON.stringify(this.fileConfig, null, 2), {
          mode: CONFIG_FILE_MODE,
        });
      },
      { operation: 'saveConfig', file: CONFIG_FILE }
    );
  };

  public getConfig = (): FieldcheckConfig => {
    return { ...this.config, validGenders: [...this.config.validGenders] };
  };

  public get = <K extends ConfigKey>(key: K): FieldcheckConfig[K] => {
    return this.config[key];
  };

  public set = async (key: ConfigKey, value: unknown): Promise<void> => {
    const candidate: Record<string, unknown> = { ...this.fileConfig, [key]: value };
    const result = FieldcheckConfigSchema.partial().safeParse(candidate);

    if (!result.success) {
      throw new SecureError(
        `Invalid value for ${key}: ${formatIssues(result.error.issues)}`,
        ErrorType.VALIDATION_ERROR,
        { operation: 'setConfig', key },
        true
      );
    }

    this.fileConfig = result.data;
    this.config = resolveConfig(this.fileConfig, process.env);
    await this.writeConfigFile();
  };

  public reset = async (): Promise<void> => {
    this.fileConfig = {};
    this.config = resolveConfig(this.fileConfig, process.env);
    await this.writeConfigFile();
  };
}

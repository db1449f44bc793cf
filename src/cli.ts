#!/usr/bin/env node

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import process from 'process';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { match, P } from 'ts-pattern';
import { ConfigManager } from './config.js';
import { FieldCheck } from './core/fieldcheck.js';
import { toErrorResponse } from './core/http.js';
import { CheckKindSchema, FieldcheckConfigSchema, type ConfigKey } from './schemas/validation.js';
import type { ValidationResult } from './types/validation.js';
import { ErrorType } from './types/error-handler.js';
import { ErrorHandler, SecureError, withErrorHandling } from './utils/error-handler.js';
import { exitProcess, handleErrorImmediate } from './utils/process-utils.js';
import { fileFromPath } from './services/file-source.js';
import {
  ERROR_MESSAGES,
  HELP_MESSAGES,
  INFO_MESSAGES,
  SUCCESS_MESSAGES,
  WARNING_MESSAGES,
} from './constants/messages.js';
import { UI_CONSTANTS } from './constants/ui.js';

type InquirerModule = typeof import('inquirer');
type GradientStringModule = typeof import('gradient-string');

let inquirerCache: InquirerModule | null = null;
let gradientStringCache: GradientStringModule | null = null;

const loadInquirer = async (): Promise<InquirerModule> => {
  inquirerCache ??= await import('inquirer');
  return inquirerCache;
};

const loadGradientString = async (): Promise<GradientStringModule> => {
  gradientStringCache ??= await import('gradient-string');
  return gradientStringCache;
};

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, '../package.json'), 'utf-8'));
const version = match(packageJson)
  .with({ version: P.string }, ({ version }) => version)
  .otherwise(() => '0.0.0');

const program = new Command();

// `--typed` and `config set` take literal booleans and numbers
const parseTypedValue = (value: string): string | number | boolean => {
  const lowerValue = value.toLowerCase();

  switch (lowerValue) {
    case 'true':
      return true;
    case 'false':
      return false;
    default:
      return value.trim() !== '' && !isNaN(Number(value)) ? Number(value) : value;
  }
};

const parseConfigValue = (key: ConfigKey, value: string): unknown =>
  key === 'validGenders'
    ? value.split(',').map((gender) => gender.trim())
    : key === 'phoneRegion'
      ? value
      : parseTypedValue(value);

const isConfigKey = (key: string): key is ConfigKey =>
  Object.hasOwn(FieldcheckConfigSchema.shape, key);

const presentValue = (value: unknown): string | number | boolean =>
  match(value)
    .with(P.union(P.string, P.number, P.boolean), (primitive) => primitive)
    .with(
      { start: { date: P.instanceOf(Date) }, end: { date: P.instanceOf(Date) } },
      ({ start, end }) => `${start.date.toISOString()} / ${end.date.toISOString()}`
    )
    .with(
      { date: P.instanceOf(Date), format: P.string },
      ({ date, format }) => `${date.toISOString()} (${format})`
    )
    .with({ filename: P.string }, ({ filename }) => filename)
    .otherwise(() => String(value));

const reportResult = <T>(result: ValidationResult<T>, json: boolean): void => {
  if (result.isValid) {
    const value = presentValue(result.sanitizedValue);
    console.log(
      json
        ? JSON.stringify({ valid: true, value })
        : chalk.green(`${UI_CONSTANTS.SYMBOLS.VALID} ${SUCCESS_MESSAGES.VALID}: ${value}`)
    );
    return;
  }

  const { code, category, message } = result.error;
  if (json) {
    const response = toErrorResponse(result.error);
    console.log(JSON.stringify({ valid: false, status: response.status, code, body: response.body }));
  } else {
    console.error(chalk.red(`${UI_CONSTANTS.SYMBOLS.INVALID} ${code} (${category}): ${message}`));
  }
  exitProcess(1);
};

const withSpinner = async <T>(spinner: Ora | null, operation: () => Promise<T>): Promise<T> => {
  try {
    return await operation();
  } finally {
    spinner?.stop();
  }
};

program
  .name('fieldcheck')
  .description('🔎 Validate form field values from the command line')
  .version(version);

program
  .command('check <kind> <value>')
  .alias('c')
  .description('Check a single value against the rules of a field kind')
  .option('--min <number>', 'Lower bound for range checks')
  .option('--max <number>', 'Upper bound for range checks')
  .option('--min-length <number>', 'Minimum length for string checks')
  .option('--max-length <number>', 'Maximum length for string checks')
  .option('--places <number>', 'Maximum decimal places for decimal checks')
  .option('--min-age <number>', 'Minimum age for age checks')
  .option('--max-age <number>', 'Maximum age for age checks')
  .option('--region <code>', 'ISO 3166 alpha-2 region for phone checks')
  .option('--no-dns', 'Skip the mail exchanger lookup for email checks')
  .option('-t, --typed', 'Read true/false and numbers as booleans and numbers')
  .option('--json', 'Print the result as JSON')
  .action(
    async (
      kind: string,
      rawValue: string,
      options: {
        min?: string;
        max?: string;
        minLength?: string;
        maxLength?: string;
        places?: string;
        minAge?: string;
        maxAge?: string;
        region?: string;
        dns: boolean;
        typed?: boolean;
        json?: boolean;
      }
    ): Promise<void> => {
      await withErrorHandling(
        async (): Promise<void> => {
          const { dns, typed, json = false, ...bounds } = options;
          const value = typed ? parseTypedValue(rawValue) : rawValue;
          const fieldCheck = new FieldCheck();

          const spinner =
            kind === 'email' && dns && !json
              ? ora(UI_CONSTANTS.SPINNER_MESSAGES.CHECKING_DOMAIN).start()
              : null;

          const result = await withSpinner(spinner, () =>
            fieldCheck.check(kind, value, { ...bounds, checkDomain: dns ? undefined : false })
          );
          reportResult(result, json);
        },
        { operation: 'check', kind }
      );
    }
  );

program
  .command('range <start> <end>')
  .alias('r')
  .description('Check that two dates are valid and that start is before end')
  .option('--json', 'Print the result as JSON')
  .action(async (start: string, end: string, options: { json?: boolean }): Promise<void> => {
    await withErrorHandling(
      async (): Promise<void> => {
        reportResult(new FieldCheck().checkDateRange(start, end), options.json ?? false);
      },
      { operation: 'range' }
    );
  });

program
  .command('file <path>')
  .alias('f')
  .description('Check an uploaded document or image')
  .option('-k, --kind <kind>', 'document or image', 'document')
  .option('--max-size <mb>', 'Maximum file size in MB')
  .option('--verify-image', 'Decode the image and check its dimensions')
  .option('--json', 'Print the result as JSON')
  .action(
    async (
      filePath: string,
      options: { kind: string; maxSize?: string; verifyImage?: boolean; json?: boolean }
    ): Promise<void> => {
      await withErrorHandling(
        async (): Promise<void> => {
          const json = options.json ?? false;
          const spinner = json ? null : ora(UI_CONSTANTS.SPINNER_MESSAGES.READING_FILE).start();
          const file = await withSpinner(spinner, () => fileFromPath(filePath));

          const result = new FieldCheck().checkFile(file, {
            kind: options.kind,
            maxSizeMb: options.maxSize,
            verifyImage: options.verifyImage,
          });
          reportResult(result, json);
        },
        { operation: 'file', file: filePath }
      );
    }
  );

program
  .command('kinds')
  .description('List the available check kinds')
  .action((): void => {
    console.log(chalk.blue(INFO_MESSAGES.AVAILABLE_KINDS));
    for (const kind of CheckKindSchema.options) {
      console.log(`  ${kind}`);
    }
    console.log(chalk.gray(`  document, image ${chalk.italic('(fieldcheck file --kind)')}`));
  });

const configCmd = program.command('config').description('Manage fieldcheck configuration');

configCmd
  .command('set <key> <value>')
  .description('Set configuration value')
  .action(async (key: string, value: string): Promise<void> => {
    await withErrorHandling(
      async (): Promise<void> => {
        if (!isConfigKey(key)) {
          throw new SecureError(
            `${ERROR_MESSAGES.INVALID_CONFIG_KEY}: ${key}. Allowed keys: ${Object.keys(FieldcheckConfigSchema.shape).join(', ')}`,
            ErrorType.VALIDATION_ERROR,
            { operation: 'configSet', key },
            true
          );
        }

        const config = ConfigManager.getInstance();
        await config.set(key, parseConfigValue(key, value));
        console.log(chalk.green(`${UI_CONSTANTS.SYMBOLS.VALID} Set ${key} = ${String(config.get(key))}`));
      },
      { operation: 'configSet', key }
    );
  });

configCmd
  .command('get [key]')
  .description('Get configuration value(s)')
  .action(async (key?: string): Promise<void> => {
    await withErrorHandling(
      async (): Promise<void> => {
        const config = ConfigManager.getInstance();

        if (key) {
          if (!isConfigKey(key)) {
            throw new SecureError(
              `${ERROR_MESSAGES.INVALID_CONFIG_KEY}: ${key}. Allowed keys: ${Object.keys(FieldcheckConfigSchema.shape).join(', ')}`,
              ErrorType.VALIDATION_ERROR,
              { operation: 'configGet', key },
              true
            );
          }
          console.log(`${key}: ${String(config.get(key) ?? 'Not set')}`);
          return;
        }

        console.log(chalk.blue('Current configuration:'));
        for (const [k, v] of Object.entries(config.getConfig())) {
          console.log(`  ${k}: ${String(v)}`);
        }
      },
      { operation: 'configGet', key }
    );
  });

configCmd
  .command('reset')
  .description('Reset configuration to defaults')
  .action(async (): Promise<void> => {
    try {
      const { default: inquirer } = await loadInquirer();
      const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
        {
          type: 'confirm',
          name: 'confirm',
          message: 'Are you sure you want to reset all configuration to defaults?',
          default: false,
        },
      ]);

      if (confirm) {
        await ConfigManager.getInstance().reset();
        console.log(chalk.green(`${UI_CONSTANTS.SYMBOLS.VALID} ${SUCCESS_MESSAGES.CONFIGURATION_RESET}`));
      } else {
        console.log(chalk.yellow(WARNING_MESSAGES.RESET_CANCELLED));
      }
    } catch (error) {
      handleErrorImmediate(error);
    }
  });

program
  .command('help-examples')
  .description('Show usage examples')
  .action(async (): Promise<void> => {
    const { default: gradient } = await loadGradientString();
    console.log(`${gradient.pastel(`${INFO_MESSAGES.USAGE_EXAMPLES}\n`)}

${chalk.yellow('Numbers:')}
  fieldcheck check numeric 3.14
  fieldcheck check range 42 --min 1 --max 100
  fieldcheck check age 17 --min-age 18
  fieldcheck check decimal 12.345 --places 2

${chalk.yellow('Text and contact details:')}
  fieldcheck check name "Mary-Jane O'Neil"
  fieldcheck check phone "+1 202-555-0147" --region US
  fieldcheck check email someone@example.com --no-dns
  fieldcheck check pincode 560001

${chalk.yellow('Dates, booleans and passwords:')}
  fieldcheck check date "2024-02-29 13:45"
  fieldcheck range 2024-01-01 2024-12-31
  fieldcheck check boolean true --typed
  fieldcheck check password "Example#Pass1"

${chalk.yellow('Files:')}
  fieldcheck file ./report.pdf
  fieldcheck file ./avatar.png --kind image --verify-image

${chalk.yellow('Configuration:')}
  fieldcheck config get
  fieldcheck config set dnsTimeoutMs 5000
  fieldcheck config set validGenders male,female,other
  fieldcheck config reset`);
  });

program.on('command:*', (): void => {
  console.error(chalk.red(`${UI_CONSTANTS.SYMBOLS.INVALID} Unknown command: ${program.args.join(' ')}`));
  console.log(`${chalk.yellow(`\n${UI_CONSTANTS.SYMBOLS.HINT} Available commands:`)}
${chalk.blue(`  ${HELP_MESSAGES.USAGE_COMMANDS}`)}
${chalk.blue(`  ${HELP_MESSAGES.KINDS_COMMAND}`)}`);
  process.exit(1);
});

program.parseAsync(process.argv).catch((error: unknown) => {
  // SecureErrors have already been reported by withErrorHandling
  if (error instanceof SecureError) {
    ErrorHandler.getInstance().handleProcessExit(1);
    return;
  }
  handleErrorImmediate(error);
});

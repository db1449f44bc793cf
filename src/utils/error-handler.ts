import chalk from 'chalk';
import { match, P } from 'ts-pattern';
import { sanitizeError, TimeoutError } from './security.js';
import { ERROR_LOG_LIMIT, ERROR_PATTERNS } from '../constants/error-handler.js';
import { ErrorType, type ErrorContext } from '../types/error-handler.js';

export class SecureError extends Error {
  public readonly type: ErrorType;
  public readonly context: ErrorContext;
  public readonly isRecoverable: boolean;
  public readonly userMessage: string;

  constructor(
    message: string,
    type: ErrorType = ErrorType.UNKNOWN_ERROR,
    context: ErrorContext = {},
    isRecoverable: boolean = false,
    userMessage?: string
  ) {
    super(sanitizeError(message));
    this.name = 'SecureError';
    this.type = type;
    this.context = { ...context, timestamp: new Date() };
    this.isRecoverable = isRecoverable;
    this.userMessage = userMessage ?? this.getDefaultUserMessage();
  }

  private getDefaultUserMessage(): string {
    return match(this.type)
      .with(ErrorType.VALIDATION_ERROR, () => `Invalid input provided: ${this.message}`)
      .with(
        ErrorType.NETWORK_ERROR,
        () => 'Network lookup failed. Please check your connection and try again.'
      )
      .with(
        ErrorType.FILE_SYSTEM_ERROR,
        () => 'File operation failed. Please check the path and file permissions.'
      )
      .with(
        ErrorType.CONFIG_ERROR,
        () => 'Configuration error. Please check your configuration with "fieldcheck config get".'
      )
      .with(ErrorType.TIMEOUT_ERROR, () => 'Operation timed out. Please try again.')
      .otherwise(() => 'An unexpected error occurred. Please try again.');
  }
}

export class ErrorHandler {
  private static instance: ErrorHandler;
  private errorLog: Array<{ error: SecureError; timestamp: Date }> = [];

  private constructor() {
    // Private constructor for singleton pattern
  }

  public static getInstance(): ErrorHandler {
    if (!ErrorHandler.instance) {
      ErrorHandler.instance = new ErrorHandler();
    }
    return ErrorHandler.instance;
  }

  public handleError = (error: unknown, context: ErrorContext = {}): SecureError => {
    const secureError = error instanceof SecureError ? error : this.createSecureError(error, context);

    this.logError(secureError);
    this.displayError(secureError);

    return secureError;
  };

  public createSecureError = (error: unknown, context: ErrorContext): SecureError => {
    const message = error instanceof Error ? error.message : String(error ?? 'Unknown error occurred');

    const code = match(error)
      .with({ code: P.string }, (e) => e.code)
      .otherwise(() => undefined);

    const errorType = match({ error, code })
      .with({ error: P.instanceOf(TimeoutError) }, () => ErrorType.TIMEOUT_ERROR)
      .with(
        { code: P.union('ENOENT', 'EACCES', 'EPERM', 'ENOTDIR', 'EISDIR') },
        () => ErrorType.FILE_SYSTEM_ERROR
      )
      .with(
        { code: P.union('ECONNREFUSED', 'ENOTFOUND', 'ETIMEOUT', 'ESERVFAIL') },
        () => ErrorType.NETWORK_ERROR
      )
      .otherwise(() => this.detectErrorTypeFromMessage(message));

    const isRecoverable = match(errorType)
      .with(
        ErrorType.FILE_SYSTEM_ERROR,
        ErrorType.NETWORK_ERROR,
        ErrorType.TIMEOUT_ERROR,
        ErrorType.VALIDATION_ERROR,
        ErrorType.CONFIG_ERROR,
        () => true
      )
      .with(ErrorType.UNKNOWN_ERROR, () => false)
      .exhaustive();

    return new SecureError(message, errorType, context, isRecoverable);
  };

  private readonly detectErrorTypeFromMessage = (message: string): ErrorType => {
    const lowerMsg = message.toLowerCase();

    for (const { type, patterns } of ERROR_PATTERNS) {
      if (patterns.some((pattern) => lowerMsg.includes(pattern))) {
        return type;
      }
    }

    return ErrorType.UNKNOWN_ERROR;
  };

  private readonly logError = (error: SecureError): void => {
    this.errorLog.push({ error, timestamp: new Date() });

    if (this.errorLog.length > ERROR_LOG_LIMIT) {
      this.errorLog = this.errorLog.slice(-ERROR_LOG_LIMIT);
    }
  };

  private readonly displayError = (error: SecureError): void => {
    const color = this.getErrorColor(error.type);
    console.error(color(`❌ ${error.userMessage}`));

    if (error.context.operation) {
      console.error(chalk.gray(`   Operation: ${error.context.operation}`));
    }

    if (error.context.file) {
      console.error(chalk.gray(`   File: ${error.context.file}`));
    }

    if (error.isRecoverable) {
      console.error(chalk.yellow('   💡 This error might be recoverable. Please try again.'));
    }
  };

  private readonly getErrorColor = (type: ErrorType): ((text: string) => string) => {
    return match(type)
      .with(ErrorType.VALIDATION_ERROR, ErrorType.CONFIG_ERROR, () => chalk.yellow)
      .with(ErrorType.NETWORK_ERROR, ErrorType.TIMEOUT_ERROR, () => chalk.blue)
      .with(ErrorType.FILE_SYSTEM_ERROR, () => chalk.cyan)
      .otherwise(() => chalk.red);
  };

  public handleProcessExit = (code: number = 1): void => {
    if (this.errorLog.length > 0) {
      console.error(chalk.gray(`\n📊 Error Summary: ${this.errorLog.length} errors logged`));
    }
    process.exit(code);
  };
}

export const withErrorHandling = async <T>(
  operation: () => Promise<T>,
  context: ErrorContext = {}
): Promise<T> => {
  const errorHandler = ErrorHandler.getInstance();

  try {
    return await operation();
  } catch (error) {
    const secureError = errorHandler.handleError(error, context);

    if (!secureError.isRecoverable) {
      errorHandler.handleProcessExit(1);
    }

    throw secureError;
  }
};

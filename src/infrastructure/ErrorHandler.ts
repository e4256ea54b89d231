/**
 * ErrorHandler - Error Handling with Recovery Strategies
 *
 * Provides error handling with:
 * - Error categorization by severity and type
 * - Synchronous recovery strategies
 * - Context information in error logs
 * - Error aggregation for batch operations (rc loading)
 * - Error events through EventBus
 *
 * Key handling never waits on the handler: recovery runs synchronously and
 * only decides what is reported, the session itself is reset by the caller.
 *
 * @module infrastructure/ErrorHandler
 */

import type { IEventBus, IErrorHandler, CategorizedError } from '../types/services';
import { ErrorSeverity, ErrorCategory } from '../types/services';
import { EventType } from '../types/events';
import { getLogger } from '../services/Logger';

const log = getLogger('dispatch');

/**
 * Recovery result from a recovery strategy
 */
export interface RecoveryResult {
  success: boolean;
  silent?: boolean;
  message?: string;
}

/**
 * Recovery strategy interface
 */
export interface RecoveryStrategy {
  /** Reported in `error:recovered` */
  readonly name: string;

  /**
   * Check if this strategy can recover from the given error
   */
  canRecover(error: CategorizedError): boolean;

  /**
   * Attempt to recover from the error
   */
  recover(error: CategorizedError): RecoveryResult;
}

/**
 * Aggregated error report for batch operations
 */
export interface AggregatedError {
  summary: string;
  count: number;
  errors: CategorizedError[];
  firstOccurrence: number;
  lastOccurrence: number;
  categories: Map<ErrorCategory, number>;
  severities: Map<ErrorSeverity, number>;
}

/**
 * Category for each engine error code
 */
const CODE_CATEGORIES: Record<string, ErrorCategory> = {
  BAD_COMMAND: ErrorCategory.BAD_COMMAND,
  WRITE_REJECTED: ErrorCategory.WRITE_REJECTED,
  ACTION_FAILED: ErrorCategory.EXECUTION,
  MAPPING_CONFIG: ErrorCategory.MAPPING,
  REGISTRY_CONFLICT: ErrorCategory.CONFIG,
  INTERNAL: ErrorCategory.INTERNAL,
  ENOENT: ErrorCategory.FILE,
};

/**
 * Default recovery strategies
 */
const defaultRecoveryStrategies: RecoveryStrategy[] = [
  // Bad key sequences - the session has been reset, nothing else to do
  {
    name: 'session-reset',
    canRecover: (e) =>
      e.category === ErrorCategory.BAD_COMMAND || e.category === ErrorCategory.WRITE_REJECTED,
    recover: () => ({ success: true, silent: true }),
  },
  // File not found - silent handling
  {
    name: 'missing-file',
    canRecover: (e) =>
      e.category === ErrorCategory.FILE &&
      (e.code === 'ENOENT' || e.error.message.includes('not found')),
    recover: () => ({ success: true, silent: true }),
  },
  // Parse and mapping errors - not recoverable but provide context
  {
    name: 'manual-correction',
    canRecover: (e) => e.category === ErrorCategory.PARSE || e.category === ErrorCategory.MAPPING,
    recover: () => ({
      success: false,
      message: 'Configuration errors require manual correction',
    }),
  },
];

/**
 * Maximum number of errors to keep in history
 */
const MAX_ERROR_HISTORY = 100;

function readStringField(error: Error, field: 'code' | 'errorCode'): string | undefined {
  if (field in error) {
    const value: unknown = Reflect.get(error, field);
    return typeof value === 'string' ? value : undefined;
  }
  return undefined;
}

/**
 * ErrorHandler implementation
 *
 * Manages error handling with categorization, recovery, and event emission.
 */
export class ErrorHandler implements IErrorHandler {
  /**
   * EventBus for emitting error events
   */
  private eventBus: IEventBus;

  /**
   * Error history for recent errors
   */
  private errorHistory: CategorizedError[];

  /**
   * Recovery strategies
   */
  private recoveryStrategies: RecoveryStrategy[];

  /**
   * Current aggregation context (for batch operations)
   */
  private aggregationContext: AggregatedError | null;

  /**
   * Create a new ErrorHandler
   *
   * @param eventBus - EventBus for emitting error events
   * @param customStrategies - Optional custom recovery strategies
   */
  constructor(eventBus: IEventBus, customStrategies?: RecoveryStrategy[]) {
    this.eventBus = eventBus;
    this.errorHistory = [];
    this.recoveryStrategies = customStrategies || [...defaultRecoveryStrategies];
    this.aggregationContext = null;
  }

  /**
   * Handle an error with automatic categorization
   *
   * @param error - The error to handle
   * @param context - Context information about where the error occurred
   */
  handle(error: Error, context: string): void {
    this.handleCategorized(this.createCategorizedError(error, context));
  }

  /**
   * Handle a pre-categorized error
   *
   * @param error - The categorized error to handle
   */
  handleCategorized(error: CategorizedError): void {
    this.addToHistory(error);

    if (this.aggregationContext) {
      this.addToAggregation(error);
    }

    if (error.severity === ErrorSeverity.FATAL || error.severity === ErrorSeverity.ERROR) {
      log.error(`[${error.context}] ${error.error.message}`);
    } else {
      log.debug(`[${error.context}] ${error.error.message}`);
    }

    // Batched errors are reported once, by endAggregation
    if (!this.aggregationContext) {
      this.eventBus.emit(EventType.ERROR_OCCURRED, {
        error: error.error,
        context: error.context,
        severity: error.severity,
      });
    }

    if (error.recoverable) {
      this.attemptRecovery(error);
    }
  }

  /**
   * Start aggregation context for batch operations
   */
  startAggregation(): void {
    const now = Date.now();
    this.aggregationContext = {
      summary: '',
      count: 0,
      errors: [],
      firstOccurrence: now,
      lastOccurrence: now,
      categories: new Map(),
      severities: new Map(),
    };
  }

  /**
   * End aggregation context and return aggregated result
   *
   * Emits one `error:occurred` carrying the summary when anything was collected.
   */
  endAggregation(): AggregatedError | null {
    if (!this.aggregationContext) {
      return null;
    }

    const result = this.aggregationContext;
    result.summary = this.generateSummary(result.errors);
    this.aggregationContext = null;

    if (result.count > 0) {
      this.eventBus.emit(EventType.ERROR_OCCURRED, {
        error: new Error(result.summary),
        context: `Aggregated: ${result.count} errors`,
        severity: this.getHighestSeverity(result.errors),
      });
    }

    return result;
  }

  /**
   * Get recent errors from history
   */
  getRecentErrors(): CategorizedError[] {
    return [...this.errorHistory];
  }

  /**
   * Get errors filtered by category
   */
  getErrorsByCategory(category: ErrorCategory): CategorizedError[] {
    return this.errorHistory.filter((e) => e.category === category);
  }

  /**
   * Get errors filtered by severity
   */
  getErrorsBySeverity(severity: ErrorSeverity): CategorizedError[] {
    return this.errorHistory.filter((e) => e.severity === severity);
  }

  /**
   * Clear error history
   */
  clearHistory(): void {
    this.errorHistory = [];
  }

  /**
   * Add a custom recovery strategy
   */
  addRecoveryStrategy(strategy: RecoveryStrategy): void {
    this.recoveryStrategies.push(strategy);
  }

  /**
   * Create a categorized error from an Error and context
   *
   * @param error - The original error
   * @param context - Context information
   * @returns Categorized error with inferred category and severity
   */
  createCategorizedError(
    error: Error,
    context: string,
    options?: {
      category?: ErrorCategory;
      severity?: ErrorSeverity;
      code?: string;
      recoverable?: boolean;
    }
  ): CategorizedError {
    const code = options?.code ?? this.extractErrorCode(error);
    const category = options?.category || this.inferCategory(error, context, code);
    const severity = options?.severity || this.inferSeverity(error, category);
    const recoverable = options?.recoverable ?? this.isRecoverable(error, category, code);

    return {
      error,
      category,
      severity,
      context,
      code,
      recoverable,
    };
  }

  /**
   * Infer error category from error code, message and context
   */
  private inferCategory(error: Error, context: string, code: string | undefined): ErrorCategory {
    if (code !== undefined && CODE_CATEGORIES[code] !== undefined) {
      return CODE_CATEGORIES[code];
    }

    const message = error.message.toLowerCase();
    const contextLower = context.toLowerCase();

    if (message.includes('parse') || message.includes('syntax') || contextLower.includes('parse')) {
      return ErrorCategory.PARSE;
    }

    if (message.includes('mapping') || contextLower.includes('mapping')) {
      return ErrorCategory.MAPPING;
    }

    if (
      message.includes('file') ||
      message.includes('enoent') ||
      contextLower.includes('file')
    ) {
      return ErrorCategory.FILE;
    }

    if (contextLower.includes('setting') || contextLower.includes('config')) {
      return ErrorCategory.CONFIG;
    }

    if (message.includes('execute') || contextLower.includes('dispatch')) {
      return ErrorCategory.EXECUTION;
    }

    return ErrorCategory.INTERNAL;
  }

  /**
   * Infer error severity from error and category
   */
  private inferSeverity(error: Error, category: ErrorCategory): ErrorSeverity {
    switch (category) {
      case ErrorCategory.INTERNAL:
        return ErrorSeverity.FATAL;
      case ErrorCategory.BAD_COMMAND:
      case ErrorCategory.WRITE_REJECTED:
      case ErrorCategory.MAPPING:
      case ErrorCategory.CONFIG:
        return ErrorSeverity.WARNING;
      case ErrorCategory.FILE:
        return error.message.toLowerCase().includes('not found')
          ? ErrorSeverity.INFO
          : ErrorSeverity.ERROR;
      default:
        return ErrorSeverity.ERROR;
    }
  }

  /**
   * Check if any recovery strategy can handle an error
   */
  private isRecoverable(error: Error, category: ErrorCategory, code: string | undefined): boolean {
    const probe: CategorizedError = {
      error,
      category,
      severity: ErrorSeverity.ERROR,
      context: '',
      code,
      recoverable: false,
    };

    return this.recoveryStrategies.some((s) => s.canRecover(probe));
  }

  /**
   * Extract error code from error if available
   */
  private extractErrorCode(error: Error): string | undefined {
    return readStringField(error, 'errorCode') ?? readStringField(error, 'code');
  }

  /**
   * Attempt recovery using registered strategies
   */
  private attemptRecovery(error: CategorizedError): void {
    for (const strategy of this.recoveryStrategies) {
      if (!strategy.canRecover(error)) {
        continue;
      }

      let result: RecoveryResult;
      try {
        result = strategy.recover(error);
      } catch (recoveryError) {
        log.warn(`Recovery strategy ${strategy.name} failed:`, recoveryError);
        continue;
      }

      if (result.success) {
        this.eventBus.emit(EventType.ERROR_RECOVERED, {
          error: error.error,
          context: error.context,
          strategy: strategy.name,
        });
        return;
      }

      if (result.message) {
        log.warn(result.message);
      }
    }
  }

  /**
   * Add error to history with size limit
   */
  private addToHistory(error: CategorizedError): void {
    this.errorHistory.push(error);

    if (this.errorHistory.length > MAX_ERROR_HISTORY) {
      this.errorHistory.shift();
    }
  }

  /**
   * Add error to current aggregation context
   */
  private addToAggregation(error: CategorizedError): void {
    if (!this.aggregationContext) {
      return;
    }

    this.aggregationContext.errors.push(error);
    this.aggregationContext.count++;
    this.aggregationContext.lastOccurrence = Date.now();

    const catCount = this.aggregationContext.categories.get(error.category) || 0;
    this.aggregationContext.categories.set(error.category, catCount + 1);

    const sevCount = this.aggregationContext.severities.get(error.severity) || 0;
    this.aggregationContext.severities.set(error.severity, sevCount + 1);
  }

  /**
   * Generate summary for aggregated errors
   */
  private generateSummary(errors: CategorizedError[]): string {
    if (errors.length === 0) {
      return 'No errors';
    }

    if (errors.length === 1) {
      return errors[0].error.message;
    }

    const categories = new Map<ErrorCategory, number>();
    for (const error of errors) {
      const count = categories.get(error.category) || 0;
      categories.set(error.category, count + 1);
    }

    const parts: string[] = [];
    for (const [category, count] of categories) {
      parts.push(`${count} ${category}`);
    }

    return `${errors.length} errors: ${parts.join(', ')}`;
  }

  /**
   * Get highest severity from a list of errors
   */
  private getHighestSeverity(errors: CategorizedError[]): ErrorSeverity {
    const severityOrder = [
      ErrorSeverity.INFO,
      ErrorSeverity.WARNING,
      ErrorSeverity.ERROR,
      ErrorSeverity.FATAL,
    ];

    let highest = ErrorSeverity.INFO;

    for (const error of errors) {
      if (severityOrder.indexOf(error.severity) > severityOrder.indexOf(highest)) {
        highest = error.severity;
      }
    }

    return highest;
  }
}

import type { ILogger } from '../logging/logger';
import { Result } from '../result/result';

/**
 * Error types for categorising failures by the layer they came from
 */
export enum ErrorType {
	VALIDATION = 'VALIDATION',
	DICTIONARY = 'DICTIONARY',
	TRANSPORT = 'TRANSPORT',
	SYSTEM = 'SYSTEM',
}

/**
 * Structured error information
 */
export interface ErrorInfo {
	type: ErrorType;
	code: string;
	message: string;
	context?: Record<string, unknown>;
	originalError: Error;
}

/**
 * Unified error handler: logs the failure once and hands back a failed Result
 */
export class ErrorHandler {
	constructor(private readonly logger: ILogger) {}

	handleError<T>(
		error: unknown,
		type: ErrorType,
		code: string,
		message: string,
		context?: Record<string, unknown>
	): Result<T> {
		const errorInfo = this.createErrorInfo(error, type, code, message, context);
		this.logError(errorInfo);
		return Result.failure(new Error(`${errorInfo.message}: ${errorInfo.originalError.message}`));
	}

	/**
	 * Run an operation, converting a thrown error into a failed Result
	 */
	async safeExecute<T>(
		operation: () => Promise<T>,
		type: ErrorType,
		operationName: string,
		context?: Record<string, unknown>
	): Promise<Result<T>> {
		try {
			const result = await operation();
			return Result.success(result);
		} catch (error) {
			return this.handleError(
				error,
				type,
				`${type}_${operationName.toUpperCase()}_FAILED`,
				`Failed to ${operationName.replace(/_/g, ' ')}`,
				context
			);
		}
	}

	private createErrorInfo(
		error: unknown,
		type: ErrorType,
		code: string,
		message: string,
		context?: Record<string, unknown>
	): ErrorInfo {
		return {
			type,
			code,
			message,
			context,
			originalError: error instanceof Error ? error : new Error(String(error)),
		};
	}

	private logError(errorInfo: ErrorInfo): void {
		const logContext = {
			type: errorInfo.type,
			code: errorInfo.code,
			context: errorInfo.context,
			error: errorInfo.originalError.message,
			stack: errorInfo.originalError.stack,
		};

		switch (errorInfo.type) {
			case ErrorType.VALIDATION:
				this.logger.warn(errorInfo.message, logContext);
				break;
			case ErrorType.DICTIONARY:
			case ErrorType.TRANSPORT:
			case ErrorType.SYSTEM:
			default:
				this.logger.error(errorInfo.message, logContext);
				break;
		}
	}
}

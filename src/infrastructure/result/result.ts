/**
 * Outcome of an operation that can fail in an expected way
 */
export class Result<T> {
	readonly success: boolean;

	readonly data?: T;

	readonly error?: Error;

	private constructor(success: boolean, data?: T, error?: Error) {
		this.success = success;
		this.data = data;
		this.error = error;
	}

	static success<T>(data: T): Result<T> {
		return new Result<T>(true, data);
	}

	static failure<T>(error: Error): Result<T> {
		return new Result<T>(false, undefined, error);
	}

	/**
	 * Maps the result data to a new type
	 * @param fn - Mapping function
	 * @returns Mapped result, or the same failure
	 */
	map<U>(fn: (data: T) => U): Result<U> {
		if (this.success && this.data !== undefined) {
			return Result.success(fn(this.data));
		}
		return Result.failure<U>(this.error ?? new Error('Unknown error'));
	}

	/**
	 * Collapses the result into a single value
	 * @param onSuccess - Called with the data of a successful result
	 * @param onFailure - Called with the error of a failed result
	 */
	fold<U>(onSuccess: (data: T) => U, onFailure: (error: Error) => U): U {
		if (this.success && this.data !== undefined) {
			return onSuccess(this.data);
		}
		return onFailure(this.error ?? new Error('Unknown error'));
	}

	onSuccess(fn: (data: T) => void): Result<T> {
		if (this.success && this.data !== undefined) {
			fn(this.data);
		}
		return this;
	}

	onFailure(fn: (error: Error) => void): Result<T> {
		if (!this.success && this.error) {
			fn(this.error);
		}
		return this;
	}
}

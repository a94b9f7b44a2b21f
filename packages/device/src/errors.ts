/**
 * Error codes raised while reading or writing a field
 */
export type DataSourceErrorCode =
	| "UNKNOWN_FIELD"
	| "NO_HANDLE"
	| "READONLY"
	| "CONTROL_SYSTEM";

/**
 * A field could not be read or written. Conversion failures are not wrapped
 * and reach the caller as ConversionError.
 */
export class DataSourceError extends Error {
	readonly code: DataSourceErrorCode;

	constructor(
		message: string,
		code: DataSourceErrorCode,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "DataSourceError";
		this.code = code;
		Object.setPrototypeOf(this, DataSourceError.prototype);
	}
}

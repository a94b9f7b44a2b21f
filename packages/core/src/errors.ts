/**
 * Error codes raised while converting a value
 */
export type ConversionErrorCode =
	| "DIVISION_ERROR"
	| "NOT_INVERTIBLE"
	| "DOMAIN_ERROR"
	| "UNKNOWN_UNITS";

/**
 * A failure of a single conversion record.
 *
 * DOMAIN_ERROR is only raised while a record is being built; the other codes
 * are deterministic call-time failures and are never worth retrying.
 */
export class ConversionError extends Error {
	readonly code: ConversionErrorCode;

	constructor(message: string, code: ConversionErrorCode) {
		super(message);
		this.name = "ConversionError";
		this.code = code;
		Object.setPrototypeOf(this, ConversionError.prototype);
	}
}

/**
 * Error codes raised while building a conversion registry
 */
export type RegistryBuildErrorCode =
	| "MALFORMED_ROW"
	| "UNKNOWN_CONVERSION"
	| "COEFFICIENT_GAP"
	| "DUPLICATE_KEY"
	| "INVALID_LIMITS"
	| "DOMAIN_ERROR";

/** Identifies the table row that broke a registry build */
export interface RowLocation {
	elementId?: number;
	field?: string;
	conversionId?: number;
}

/**
 * Rejects a whole registry build. The message always names the element,
 * field and conversion id that were being processed so the data producer
 * can be fixed.
 */
export class RegistryBuildError extends Error {
	readonly code: RegistryBuildErrorCode;
	readonly location: RowLocation;

	constructor(
		message: string,
		code: RegistryBuildErrorCode,
		location: RowLocation,
		options?: { cause?: unknown },
	) {
		super(`${describeLocation(location)}: ${message}`, options);
		this.name = "RegistryBuildError";
		this.code = code;
		this.location = location;
		Object.setPrototypeOf(this, RegistryBuildError.prototype);
	}
}

function describeLocation(location: RowLocation): string {
	const parts: string[] = [];
	if (location.elementId !== undefined) {
		parts.push(`element ${location.elementId}`);
	}
	if (location.field !== undefined) parts.push(`field "${location.field}"`);
	if (location.conversionId !== undefined) {
		parts.push(`conversion ${location.conversionId}`);
	}
	return parts.length > 0 ? parts.join(", ") : "unit tables";
}

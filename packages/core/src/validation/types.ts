/**
 * Error codes for validation failures
 */
export type ValidationErrorCode =
	| "NOT_STRICTLY_INCREASING"
	| "NOT_INCREASING"
	| "INVALID_NUMBER"
	| "TOO_SHORT"
	| "INVALID_RANGE";

/**
 * Result of a validation check
 */
export interface ValidationResult {
	/** Whether the value is valid */
	valid: boolean;
	/** Error message if invalid */
	error?: string;
	/** Error code for programmatic handling */
	code?: ValidationErrorCode;
	/** Position of the offending sample, for sequence checks */
	index?: number;
	/** Suggested value to use instead */
	suggestedValue?: number;
}

/**
 * Context for sequence checks
 */
export interface ValidationContext {
	/** Previous value in sequence (for monotonic checks) */
	previousValue?: number | undefined;
}

/**
 * Options for sequence validation
 */
export interface SequenceValidationOptions {
	/** Minimum number of samples @default 2 */
	minLength?: number;
	/** Require strictly increasing (>) rather than non-decreasing @default true */
	strict?: boolean;
	/** Label used in error messages, e.g. "current" */
	label?: string;
}

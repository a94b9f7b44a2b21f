/**
 * Error codes raised while reading a lattice mode directory
 */
export type LatticeCsvErrorCode = "UNKNOWN_MODE" | "MISSING_FILE" | "MALFORMED_FILE";

export class LatticeCsvError extends Error {
	readonly code: LatticeCsvErrorCode;
	/** Path of the offending file or directory */
	readonly path: string;

	constructor(
		message: string,
		code: LatticeCsvErrorCode,
		path: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "LatticeCsvError";
		this.code = code;
		this.path = path;
		Object.setPrototypeOf(this, LatticeCsvError.prototype);
	}
}

/**
 * Errors raised by sessions. Every error carries the `code` and `info` pair that
 * MediaWiki itself uses for API errors, so callers can branch on `err.code`.
 *
 * @module
 */

export class ActionError extends Error {

	/**
	 * Machine-readable error code.
	 */
	readonly code: string;

	/**
	 * Human-readable description, without the log prefix.
	 */
	readonly info: string;

	/**
	 * The underlying error or response, if any.
	 */
	readonly details?: unknown;

	constructor(code: string, info: string, details?: unknown) {
		super('[wiki-action] ' + info);
		this.name = new.target.name;
		this.code = code;
		this.info = info;
		this.details = details;
	}

}

/**
 * Bad API endpoint or initializer. Raised at construction.
 */
export class ConfigurationError extends ActionError {
	constructor(info: string, details?: unknown) {
		super('config', info, details);
	}
}

/**
 * A parameter value that cannot be put on the wire. Raised before any network call.
 */
export class InvalidParameterError extends ActionError {

	readonly key: string;

	constructor(key: string, info: string) {
		super('badparam', info);
		this.key = key;
	}

}

/**
 * Network, TLS, timeout or HTTP-level failure, or a response that is not a JSON tree.
 */
export class TransportError extends ActionError {}

/**
 * An expected token is missing from a response.
 */
export class AuthenticationError extends ActionError {}

/**
 * Two results that cannot be combined: mismatched kinds, or unequal scalars.
 */
export class MergeConflictError extends ActionError {

	/**
	 * Key path of the conflicting values (empty for the root).
	 */
	readonly path: string[];

	constructor(path: string[], info: string) {
		super('mergeconflict', info);
		this.path = path;
	}

}

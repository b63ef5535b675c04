// ************************************ parameters ************************************

/**
 * A single parameter value as it appears on the wire.
 */
export type ParamScalar = string|number|boolean;

/**
 * A parameter value accepted by {@link Session.get} and {@link Session.post}.
 *
 * - a scalar is sent as is;
 * - a list is sent pipe-joined (`['a', 'b']` becomes `'a|b'`);
 * - `false` (or `undefined`) omits the parameter from the request.
 */
export type ParamValue = ParamScalar|ParamScalar[]|false|undefined;

/**
 * The API query parameters.
 */
export interface ApiParams {
	[key: string]: ParamValue;
}

/**
 * Parameters after {@link normalize}: flat, with no omitted keys and no lists.
 */
export interface WireParams {
	[key: string]: ParamScalar;
}

// ************************************ results ************************************

export type ResultScalar = string|number|boolean|null;

export interface ResultMapping {
	[key: string]: ResultTree;
}

export type ResultSequence = ResultTree[];

/**
 * A decoded JSON response body, or the accumulation of several of them.
 */
export type ResultTree = ResultMapping|ResultSequence|ResultScalar;

// ************************************ transport ************************************

/**
 * Response headers keyed by lower-case name. Repeated headers (`set-cookie`) keep every value.
 */
export interface ResponseHeaders {
	[name: string]: string|string[]|undefined;
}

export type TransportRequest = {
	method: 'GET';
	query: WireParams;
	headers: Record<string, string>;
} | {
	method: 'POST';
	body: WireParams;
	headers: Record<string, string>;
};

export interface TransportResponse {
	headers: ResponseHeaders;
	body: ResultTree;
}

// ************************************ session ************************************

/**
 * Options that change how a session folds responses into its result.
 */
export interface SessionOptions {
	/**
	 * When set, `session.result` only reflects the output of the latest request in a chain
	 * instead of accumulating. Continuation streams always enable it.
	 */
	overwrite?: boolean;
}

// ************************************ action=query&meta=tokens ************************************

/**
 * Token types of `meta=tokens`. The response key is the type followed by `token`
 * (e.g. `login` → `logintoken`).
 */
export type TokenType =
	'createaccount'|
	'csrf'|
	'deleteglobalaccount'|
	'login'|
	'patrol'|
	'rollback'|
	'setglobalaccountstatus'|
	'userrights'|
	'watch';

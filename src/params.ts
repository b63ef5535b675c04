/**
 * **Attributions**
 *
 * The parameter massaging is adapted from the mediawiki.api module in MediaWiki core,
 * which is released under the GNU GPL v2 license.
 *
 * - {@link https://doc.wikimedia.org/mediawiki-core/REL1_41/js/source/index3.html | mw.Api}
 *
 * @module
 */

import { ApiParams, ParamScalar, WireParams } from './api_types';
import { InvalidParameterError } from './errors';

/**
 * Parameters added to every request unless the caller sets them.
 */
const defaults: WireParams = {
	format: 'json'
};

/**
 * Massage parameters from the nice format we accept into a format suitable for the API.
 *
 * ```
 * normalize({action: 'query', list: ['allpages', 'recentchanges'], redirects: false});
 * // {action: 'query', list: 'allpages|recentchanges', format: 'json'}
 * ```
 *
 * @param parameters Not modified.
 * @returns A new object ready to be sent as a query string or a form body, with `token` last.
 * @throws {InvalidParameterError} If a value is not a string, a finite number, a boolean,
 * or a list of those.
 */
export function normalize(parameters: ApiParams): WireParams {
	const ret: WireParams = {};
	for (const key in parameters) {
		const val = parameters[key];
		if (val === false || val === void 0) {
			// Boolean values are only false when not given at all
			continue;
		} else if (Array.isArray(val)) {
			// Multiple values are pipe-separated
			ret[key] = val.map((v) => checkScalar(key, v)).join('|');
		} else {
			ret[key] = checkScalar(key, val);
		}
	}
	for (const key in defaults) {
		if (!(key in ret) && !(key in parameters)) {
			ret[key] = defaults[key];
		}
	}
	// Ensure that token parameter is last (per [[mw:API:Edit#Token]])
	if ('token' in ret) {
		const token = ret.token;
		delete ret.token;
		ret.token = token;
	}
	return ret;
}

/**
 * Values typed as {@link ParamScalar} can still come from untyped callers or from
 * server-supplied continuation data, so check them at run time.
 */
function checkScalar(key: string, value: unknown): ParamScalar {
	switch (typeof value) {
		case 'string':
		case 'boolean':
			return value;
		case 'number':
			if (Number.isFinite(value)) {
				return value;
			}
			throw new InvalidParameterError(key, `Parameter "${key}" is not a finite number`);
		default:
			throw new InvalidParameterError(
				key,
				`Parameter "${key}" has a value of type ${value === null ? 'null' : typeof value}, which cannot be serialized`
			);
	}
}

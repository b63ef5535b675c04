import { Cookie } from 'tough-cookie';

import { ResponseHeaders } from './api_types';

/**
 * Collect every `Set-Cookie` value from a header multimap.
 */
export function getSetCookieHeaders(headers: ResponseHeaders): string[] {
	const ret: string[] = [];
	for (const name in headers) {
		if (name.toLowerCase() !== 'set-cookie') {
			continue;
		}
		const val = headers[name];
		if (Array.isArray(val)) {
			ret.push(...val);
		} else if (typeof val === 'string') {
			ret.push(val);
		}
	}
	return ret;
}

/**
 * Parse `Set-Cookie` header values into name/value pairs. Attributes (`Path`, `Expires`,
 * `HttpOnly`...) are dropped, and so are values that do not parse as cookies.
 */
export function parseSetCookies(setCookies: string[]): [string, string][] {
	return setCookies.reduce((acc: [string, string][], header) => {
		const cookie = Cookie.parse(header);
		if (cookie) {
			acc.push([cookie.key, cookie.value]);
		}
		return acc;
	}, []);
}

/**
 * Serialize name/value pairs as the value of a `Cookie` request header.
 *
 * @returns `null` if there are no pairs.
 */
export function serializeCookies(pairs: [string, string][]): string|null {
	if (!pairs.length) {
		return null;
	}
	return pairs.map(([key, value]) => new Cookie({key, value}).cookieString()).join('; ');
}

/**
 * Prepend freshly received cookies to the ones a session already holds.
 *
 * Names are not compared: a cookie the server sends again keeps its old assignment
 * after the new one in the returned string.
 */
export function mergeCookies(fresh: string|null, stale: string|null): string|null {
	if (fresh === null) {
		return stale;
	} else if (stale === null) {
		return fresh;
	}
	return fresh + '; ' + stale;
}

/**
 * Fold the cookies of a response into the cookie string held by a session.
 */
export function updateCookie(stale: string|null, headers: ResponseHeaders): string|null {
	const fresh = serializeCookies(parseSetCookies(getSetCookieHeaders(headers)));
	return mergeCookies(fresh, stale);
}

import Axios, { AxiosHeaders, AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';

import packageJson from '../package.json';
import {
	ResponseHeaders,
	TransportRequest,
	TransportResponse
} from './api_types';
import { ConfigurationError, TransportError } from './errors';

/**
 * The capability a session uses to reach the API. Exactly one call per request;
 * implementations must not retry.
 */
export interface HttpTransport {
	send(request: TransportRequest): Promise<TransportResponse>;
}

/**
 * Transport configuration beyond the endpoint.
 */
export interface TransportOptions {
	/**
	 * An HTTP User-Agent header (`<client name>/<version> (<contact information>)`).
	 * @see https://meta.wikimedia.org/wiki/User-Agent_policy
	 */
	userAgent?: string;
	/**
	 * Default {@link https://github.com/axios/axios | Axios request config options}.
	 */
	options?: AxiosRequestConfig;
}

/**
 * Check that `apiUrl` is an absolute HTTP(S) URL.
 *
 * @throws {ConfigurationError}
 */
export function validateApiUrl(apiUrl: string): string {
	if (!apiUrl) {
		throw new ConfigurationError('No API endpoint is provided');
	}
	let url: URL;
	try {
		url = new URL(apiUrl);
	} catch (err) {
		throw new ConfigurationError(`Malformed API endpoint "${apiUrl}"`, err);
	}
	if (url.protocol !== 'http:' && url.protocol !== 'https:') {
		throw new ConfigurationError(`Unsupported protocol "${url.protocol}" in API endpoint "${apiUrl}"`);
	}
	return apiUrl;
}

/**
 * {@link HttpTransport} on a dedicated Axios instance bound to one `api.php` endpoint.
 */
export class AxiosTransport implements HttpTransport {

	/**
	 * The API endpoint. This must be included in the config of every HTTP request issued
	 * by the Axios instance.
	 */
	readonly apiUrl: string;

	/**
	 * A unique Axios instance for a transport.
	 */
	readonly axios: AxiosInstance;

	/**
	 * The default config for HTTP requests, merged with the config passed to the constructor.
	 */
	static readonly defaultOptions: AxiosRequestConfig = {
		method: 'GET',
		headers: {
			'User-Agent': 'wiki-action-session/' + packageJson.version
		},
		timeout: 30 * 1000, // 30 seconds
		responseType: 'json',
		responseEncoding: 'utf8'
	};

	/**
	 * @param apiUrl API endpoint as a full URL (e.g. `https://en.wikipedia.org/w/api.php`).
	 * @param transportOptions
	 * @throws {ConfigurationError} If `apiUrl` is missing or malformed.
	 */
	constructor(apiUrl: string, transportOptions: TransportOptions = {}) {

		this.apiUrl = validateApiUrl(apiUrl);

		const {userAgent, options} = transportOptions;
		const config = Object.assign({}, AxiosTransport.defaultOptions, options || {});
		this.axios = Axios.create(config);
		if (userAgent) {
			this.axios.defaults.headers['User-Agent'] = userAgent;
		}

	}

	async send(request: TransportRequest): Promise<TransportResponse> {

		const options: AxiosRequestConfig = {
			url: this.apiUrl, // This is required for every request even if we use an Axios **instance**
			method: request.method,
			headers: new AxiosHeaders(request.headers)
		};
		if (request.method === 'GET') {
			options.params = request.query;
		} else {
			/**
			 * The data sent by a POST request must be in either `application/x-www-form-urlencoded`
			 * or `multipart/form-data` format (no support for `application/json`).
			 *
			 * @see https://www.mediawiki.org/wiki/API:Data_formats
			 */
			const data = new URLSearchParams();
			for (const key in request.body) {
				data.append(key, String(request.body[key]));
			}
			options.data = data;
		}

		let response: AxiosResponse;
		try {
			response = await this.axios.request(options);
		} catch (err) {
			throw new TransportError('http', 'HTTP request failed', err);
		}

		const body: unknown = response.data;
		if (body === void 0 || body === null || body === '') {
			throw new TransportError('ok-but-empty', 'OK response but empty result (check HTTP headers?)', response);
		} else if (typeof body !== 'object') {
			// In most cases the raw HTML of [[Main page]]
			throw new TransportError('invalidjson', 'Invalid JSON response (check the request URL?)', response);
		}
		return {
			headers: copyHeaders(response.headers),
			body: response.data
		};

	}

}

/**
 * Copy Axios response headers into a plain multimap with lower-case names.
 */
function copyHeaders(headers: AxiosResponse['headers']): ResponseHeaders {
	const ret: ResponseHeaders = {};
	for (const [name, value] of Object.entries(headers)) {
		if (Array.isArray(value)) {
			ret[name.toLowerCase()] = value.map(String);
		} else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
			ret[name.toLowerCase()] = String(value);
		}
	}
	return ret;
}

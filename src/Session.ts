import {
	ApiParams,
	ResultTree,
	SessionOptions,
	TokenType,
	TransportRequest
} from './api_types';
import { updateCookie } from './cookies';
import { AuthenticationError, ConfigurationError } from './errors';
import { freezeTree, getPath, recursiveMerge } from './merge';
import { normalize } from './params';
import { ContinuationStream } from './stream';
import { AxiosTransport, HttpTransport, TransportOptions } from './transport';

/**
 * The parameter to {@link Session.login}.
 */
export interface Initializer extends TransportOptions {
	/**
	 * API endpoint as a full URL (e.g. `https://en.wikipedia.org/w/api.php`).
	 */
	apiUrl: string;
	/**
	 * The bot's username.
	 */
	username: string;
	/**
	 * The bot's password.
	 */
	password: string;
	/**
	 * See {@link SessionOptions.overwrite}.
	 */
	overwrite?: boolean;
}

interface SessionState {
	transport: HttpTransport;
	cookie: string|null;
	options: SessionOptions;
	result: ResultTree;
}

/**
 * An immutable connection to the {@link https://www.mediawiki.org/wiki/API:Main_page | MediaWiki Action API}.
 *
 * Every request returns a new `Session` holding the cookies received so far and the results
 * of all requests made through the chain; the session it was called on is left untouched.
 * ```
 * const session = await Session.create('https://de.wikipedia.org/w/api.php')
 * 	.get({
 * 		action: 'query',
 * 		meta: 'siteinfo',
 * 		siprop: 'statistics'
 * 	});
 * console.log(session.result);
 * ```
 * Requests can be chained to accumulate results and to hold authentication cookies:
 * ```
 * const session = await Session.create('https://test.wikipedia.org/w/api.php')
 * 	.authenticate('Example@bot', 'bot-password');
 * const edited = await session.postWithToken('csrf', {
 * 	action: 'edit',
 * 	title: 'Sandbox',
 * 	assert: 'user',
 * 	appendtext: '~~~~ was here.'
 * });
 * ```
 * A session lineage must be used by one caller at a time. Sessions created by separate
 * {@link create} calls share nothing.
 */
export class Session {

	/**
	 * The transport shared by every session derived from the same {@link create} call.
	 */
	readonly transport: HttpTransport;

	/**
	 * The value of the `Cookie` request header, or `null` until a response sets a cookie.
	 */
	readonly cookie: string|null;

	readonly options: Readonly<SessionOptions>;

	/**
	 * Recursively merged responses of all requests made using this session, or only the
	 * latest response if {@link SessionOptions.overwrite} is set. Deeply frozen, since derived
	 * sessions share subtrees with it.
	 */
	readonly result: ResultTree;

	private constructor(state: SessionState) {
		this.transport = state.transport;
		this.cookie = state.cookie;
		this.options = Object.freeze(Object.assign({}, state.options));
		this.result = freezeTree(state.result);
		Object.freeze(this);
	}

	/**
	 * Create a new client session. No request is made.
	 *
	 * @param apiUrl `api.php` endpoint for the wiki you will connect to.
	 * @param options
	 * @param transportOptions User-Agent and Axios configuration.
	 * @throws {ConfigurationError} If `apiUrl` is missing or malformed.
	 */
	static create(apiUrl: string, options: SessionOptions = {}, transportOptions: TransportOptions = {}): Session {
		return Session.fromTransport(new AxiosTransport(apiUrl, transportOptions), options);
	}

	/**
	 * Create a new client session on an existing transport.
	 */
	static fromTransport(transport: HttpTransport, options: SessionOptions = {}): Session {
		return new Session({
			transport,
			cookie: null,
			options,
			result: {}
		});
	}

	/**
	 * Create a session and log in with a {@link https://www.mediawiki.org/wiki/Manual:Bot_passwords | bot password}.
	 *
	 * @param initializer
	 * @throws {ConfigurationError} If the endpoint or the credentials are missing.
	 * @throws {AuthenticationError} If the wiki does not hand out a login token.
	 */
	static async login(initializer: Initializer): Promise<Session> {
		const {apiUrl, username, password, userAgent, options, overwrite} = initializer;
		if (!username || !password) {
			throw new ConfigurationError('Required credentials are missing');
		}
		const session = Session.create(
			apiUrl,
			overwrite === void 0 ? {} : {overwrite},
			{userAgent, options}
		);
		return session.authenticate(username, password);
	}

	/**
	 * Derive a session with different options, keeping the transport, cookie and result.
	 */
	withOptions(options: SessionOptions): Session {
		return new Session({
			transport: this.transport,
			cookie: this.cookie,
			options: Object.assign({}, this.options, options),
			result: this.result
		});
	}

	/**
	 * Perform API GET request.
	 *
	 * As with {@link https://doc.wikimedia.org/mediawiki-core/REL1_41/js/#!/api/mw.Api | mw.Api},
	 * multiple values for a parameter can be given as an array, and parameters set to `false`
	 * are omitted. `format` defaults to `json`.
	 *
	 * @param parameters API parameters.
	 * @returns A new session with the response folded into {@link result}.
	 * @throws {InvalidParameterError} Before any request, if a parameter cannot be serialized.
	 * @throws {TransportError} If the request fails.
	 * @throws {MergeConflictError} If the response cannot be merged into {@link result}.
	 */
	async get(parameters: ApiParams): Promise<Session> {
		return this.dispatch({
			method: 'GET',
			query: normalize(parameters),
			headers: this.requestHeaders()
		});
	}

	/**
	 * Perform API POST request. The parameters are sent form-encoded.
	 *
	 * @param parameters API parameters.
	 * @returns See {@link get}.
	 */
	async post(parameters: ApiParams): Promise<Session> {
		return this.dispatch({
			method: 'POST',
			body: normalize(parameters),
			headers: this.requestHeaders()
		});
	}

	private requestHeaders(): Record<string, string> {
		return this.cookie === null ? {} : {Cookie: this.cookie};
	}

	private async dispatch(request: TransportRequest): Promise<Session> {
		const response = await this.transport.send(request);
		return new Session({
			transport: this.transport,
			cookie: updateCookie(this.cookie, response.headers),
			options: this.options,
			result: this.options.overwrite
				? response.body
				: recursiveMerge(this.result, response.body)
		});
	}

	/**
	 * Log in with a {@link https://www.mediawiki.org/wiki/Manual:Bot_passwords | bot username and password}.
	 * This fetches a login token and posts `action=login` with it.
	 *
	 * The login outcome is in `result.login.result` of the returned session; a refused login
	 * is logged but not thrown.
	 *
	 * @param username Bot username, may be different than the final logged-in username.
	 * @param password Bot password.
	 * @returns Authenticated session.
	 * @throws {AuthenticationError} If the token response has no login token.
	 */
	async authenticate(username: string, password: string): Promise<Session> {

		const withToken = await this.get({
			action: 'query',
			format: 'json',
			meta: 'tokens',
			type: 'login'
		});
		const token = getPath(withToken.result, ['query', 'tokens', 'logintoken']);
		if (typeof token !== 'string') {
			throw new AuthenticationError('nologintoken', 'Login failed: No valid login token', withToken.result);
		}

		const loggedIn = await withToken.post({
			action: 'login',
			format: 'json',
			lgname: username,
			lgpassword: password,
			lgtoken: token
		});
		const outcome = getPath(loggedIn.result, ['login', 'result']);
		if (outcome === 'Success') {
			console.log('[wiki-action] Logged in as ' + username);
		} else {
			console.log('[wiki-action] Login failed', getPath(loggedIn.result, ['login']));
		}
		return loggedIn;

	}

	/**
	 * Get a token for a certain action from the API.
	 *
	 * @param tokenType The name of the token, like `csrf`.
	 * @returns The session after the token request, and the token.
	 * @throws {AuthenticationError} If the response has no token of that type.
	 */
	async getToken(tokenType: TokenType): Promise<{session: Session; token: string}> {
		const session = await this.get({
			action: 'query',
			meta: 'tokens',
			type: tokenType
		});
		const token = getPath(session.result, ['query', 'tokens', tokenType + 'token']);
		if (typeof token !== 'string') {
			throw new AuthenticationError(
				'badnamedtoken',
				'Could not find a token named "' + tokenType + '" (check for typos?)',
				session.result
			);
		}
		return {session, token};
	}

	/**
	 * Post to API with the specified type of token.
	 * ```
	 * await session.postWithToken('csrf', {
	 * 	action: 'options',
	 * 	optionname: 'gender',
	 * 	optionvalue: 'female'
	 * });
	 * ```
	 *
	 * @param tokenType The name of the token, like `csrf`.
	 * @param parameters API parameters, without `token`.
	 */
	async postWithToken(tokenType: TokenType, parameters: ApiParams): Promise<Session> {
		const {session, token} = await this.getToken(tokenType);
		return session.post(Object.assign({}, parameters, {token}));
	}

	/**
	 * Make GET requests following continuations until exhausted or the consumer stops.
	 * ```
	 * for await (const chunk of session.stream({action: 'query', list: 'recentchanges', rclimit: 5})) {
	 * 	console.log(chunk);
	 * }
	 * ```
	 * No request is made until the first chunk is pulled.
	 *
	 * @param parameters API parameters.
	 * @returns Each chunk is one raw response, possibly containing multiple records.
	 */
	stream(parameters: ApiParams): ContinuationStream {
		return new ContinuationStream(this.withOptions({overwrite: true}), parameters);
	}

}

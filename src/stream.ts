import { ApiParams, ResultTree } from './api_types';
import { InvalidParameterError } from './errors';
import { getPath } from './merge';
import type { Session } from './Session';

/**
 * `initial` holds the caller's parameters; `params` those of the next request, i.e. `initial`
 * plus the latest `continue` mapping.
 */
type StreamState =
	{kind: 'start'; session: Session; initial: ApiParams; params: ApiParams} |
	{kind: 'continue'; session: Session; initial: ApiParams; params: ApiParams} |
	{kind: 'done'};

/**
 * Lazy sequence of raw API responses that follows the `continue` mapping of each response.
 * Created by {@link Session.stream}.
 *
 * Each pull makes exactly one GET request. The sequence ends after the first response
 * without `continue`, after a failed request (which rejects that pull), or when the
 * consumer calls {@link return} (as `break` in `for await` does). It cannot be restarted.
 */
export class ContinuationStream implements AsyncIterableIterator<ResultTree> {

	private state: StreamState;

	private count = 0;

	/**
	 * @param session Must have {@link SessionOptions.overwrite} set, so that each chunk stands alone.
	 * @param params Parameters of the first request.
	 */
	constructor(session: Session, params: ApiParams) {
		this.state = {kind: 'start', session, initial: params, params};
	}

	/**
	 * Whether the stream has finished.
	 */
	get done(): boolean {
		return this.state.kind === 'done';
	}

	async next(): Promise<IteratorResult<ResultTree, undefined>> {
		const state = this.state;
		switch (state.kind) {
			case 'done':
				return {done: true, value: void 0};
			case 'start':
			case 'continue': {
				let session: Session;
				let params: ApiParams|null;
				try {
					session = await state.session.get(state.params);
					params = continueParams(state.initial, session.result);
				} catch (err) {
					this.finish();
					throw err;
				}
				this.count++;
				if (params) {
					this.state = {kind: 'continue', session, initial: state.initial, params};
				} else {
					this.finish();
				}
				return {done: false, value: session.result};
			}
		}
	}

	/**
	 * Stop the stream. No further requests are made.
	 */
	async return(): Promise<IteratorResult<ResultTree, undefined>> {
		if (this.state.kind !== 'done') {
			this.finish();
		}
		return {done: true, value: void 0};
	}

	[Symbol.asyncIterator](): this {
		return this;
	}

	/**
	 * Pull at most `limit` chunks.
	 *
	 * @param limit The maximum number of requests to make.
	 */
	async take(limit: number): Promise<ResultTree[]> {
		const ret: ResultTree[] = [];
		while (ret.length < limit) {
			const res = await this.next();
			if (res.done) {
				break;
			}
			ret.push(res.value);
		}
		return ret;
	}

	private finish(): void {
		this.state = {kind: 'done'};
		console.log(`[wiki-action] Continuation stream finished after ${this.count} request(s)`);
	}

}

/**
 * Merge the top-level `continue` mapping of a response into the parameters of the first
 * request. Keys of earlier `continue` mappings are not carried over: the server resends
 * every key it still needs.
 *
 * @returns `null` if the response has no `continue` mapping.
 * @throws {InvalidParameterError} If a continuation value is not a scalar.
 */
export function continueParams(params: ApiParams, result: ResultTree): ApiParams|null {
	const cont = getPath(result, ['continue']);
	if (cont === void 0 || cont === null || typeof cont !== 'object' || Array.isArray(cont)) {
		return null;
	}
	const ret: ApiParams = Object.assign({}, params);
	for (const key of Object.keys(cont)) {
		const val = cont[key];
		if (typeof val !== 'string' && typeof val !== 'number' && typeof val !== 'boolean') {
			throw new InvalidParameterError(key, `Continuation parameter "${key}" is not a scalar`);
		}
		ret[key] = val;
	}
	return ret;
}

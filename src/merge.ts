import { ResultMapping, ResultScalar, ResultSequence, ResultTree } from './api_types';
import { MergeConflictError } from './errors';

type Classified =
	{kind: 'mapping'; value: ResultMapping} |
	{kind: 'sequence'; value: ResultSequence} |
	{kind: 'scalar'; value: ResultScalar};

function classify(value: ResultTree): Classified {
	if (Array.isArray(value)) {
		return {kind: 'sequence', value};
	} else if (value !== null && typeof value === 'object') {
		return {kind: 'mapping', value};
	}
	return {kind: 'scalar', value};
}

/**
 * Combine two result trees so that a chain of requests accumulates a unified result.
 *
 * - Mappings: union of keys, shared keys merged recursively.
 * - Sequences: `a` followed by `b`.
 * - Equal scalars: the shared value.
 *
 * Neither input is modified.
 *
 * @throws {MergeConflictError} On mismatched kinds or unequal scalars at the same path.
 */
export function recursiveMerge(a: ResultTree, b: ResultTree): ResultTree {
	return mergeAt([], a, b);
}

function mergeAt(path: string[], a: ResultTree, b: ResultTree): ResultTree {
	const left = classify(a);
	const right = classify(b);
	switch (left.kind) {
		case 'mapping':
			if (right.kind === 'mapping') {
				const ret: ResultMapping = {};
				for (const key of Object.keys(left.value)) {
					setOwn(ret, key, left.value[key]);
				}
				for (const key of Object.keys(right.value)) {
					setOwn(ret, key, Object.prototype.hasOwnProperty.call(left.value, key)
						? mergeAt(path.concat(key), left.value[key], right.value[key])
						: right.value[key]);
				}
				return ret;
			}
			break;
		case 'sequence':
			if (right.kind === 'sequence') {
				return left.value.concat(right.value);
			}
			break;
		case 'scalar':
			if (right.kind === 'scalar' && left.value === right.value) {
				return left.value;
			}
			break;
		default: {
			const unreachable: never = left;
			return unreachable;
		}
	}
	throw new MergeConflictError(
		path,
		`Cannot merge ${describe(left)} with ${describe(right)} at "${path.join('.')}"`
	);
}

/**
 * Plain assignment would treat a `__proto__` key from a decoded response as the prototype.
 */
function setOwn(target: ResultMapping, key: string, value: ResultTree): void {
	Object.defineProperty(target, key, {value, writable: true, enumerable: true, configurable: true});
}

function describe(c: Classified): string {
	return c.kind === 'scalar' ? 'scalar ' + JSON.stringify(c.value) : c.kind;
}

/**
 * Walk a result tree along a key path.
 *
 * ```
 * getPath(session.result, ['query', 'tokens', 'csrftoken']);
 * ```
 *
 * @returns `undefined` if any step is missing or not a mapping.
 */
export function getPath(tree: ResultTree, path: string[]): ResultTree|undefined {
	let cur: ResultTree = tree;
	for (const key of path) {
		const c = classify(cur);
		if (c.kind !== 'mapping' || !Object.prototype.hasOwnProperty.call(c.value, key)) {
			return void 0;
		}
		cur = c.value[key];
	}
	return cur;
}

/**
 * Freeze a result tree and every mapping and sequence inside it.
 */
export function freezeTree<T extends ResultTree>(tree: T): T {
	const c = classify(tree);
	if (c.kind === 'mapping') {
		for (const key of Object.keys(c.value)) {
			freezeTree(c.value[key]);
		}
		Object.freeze(c.value);
	} else if (c.kind === 'sequence') {
		c.value.forEach((item) => freezeTree(item));
		Object.freeze(c.value);
	}
	return tree;
}

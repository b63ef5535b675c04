import { ResultTree } from '../src/api_types';
import { MergeConflictError } from '../src/errors';
import { freezeTree, getPath, recursiveMerge } from '../src/merge';

describe('recursiveMerge', () => {

	test('should concatenate lists', () => {
		expect(recursiveMerge({list: [1, 2]}, {list: [3]})).toEqual({list: [1, 2, 3]});
	});

	test('should take the union of keys', () => {
		expect(recursiveMerge({a: 1}, {b: 2})).toEqual({a: 1, b: 2});
	});

	test('should return the same value when merged with itself', () => {
		const tree: ResultTree = {batchcomplete: true, query: {general: {sitename: 'Test', readonly: null}}};
		expect(recursiveMerge(tree, tree)).toEqual(tree);
		expect(recursiveMerge('Test', 'Test')).toBe('Test');
	});

	test('should merge nested mappings', () => {
		expect(recursiveMerge(
			{query: {tokens: {logintoken: 'abc'}}},
			{query: {recentchanges: [{rcid: 1}]}, login: {result: 'Success'}}
		)).toEqual({
			query: {
				tokens: {logintoken: 'abc'},
				recentchanges: [{rcid: 1}]
			},
			login: {result: 'Success'}
		});
	});

	test('should not modify its inputs', () => {
		const a: ResultTree = {query: {pages: [{pageid: 1}]}};
		const b: ResultTree = {query: {pages: [{pageid: 2}]}};
		recursiveMerge(a, b);
		expect(a).toEqual({query: {pages: [{pageid: 1}]}});
		expect(b).toEqual({query: {pages: [{pageid: 2}]}});
	});

	test('should keep a __proto__ key as an ordinary key', () => {
		const b: ResultTree = JSON.parse('{"__proto__":{"y":2}}');
		const merged = recursiveMerge({x: 1}, b);
		expect(Object.getPrototypeOf(merged)).toBe(Object.prototype);
		expect(getPath(merged, ['x'])).toBe(1);
		expect(getPath(merged, ['__proto__'])).toEqual({y: 2});
	});

	test('should fail on unequal scalars', () => {
		try {
			recursiveMerge({query: {general: {sitename: 'A'}}}, {query: {general: {sitename: 'B'}}});
			throw new Error('recursiveMerge did not throw');
		} catch (err) {
			expect(err).toBeInstanceOf(MergeConflictError);
			if (err instanceof MergeConflictError) {
				expect(err.path).toEqual(['query', 'general', 'sitename']);
				expect(err.message).toBe('[wiki-action] Cannot merge scalar "A" with scalar "B" at "query.general.sitename"');
			}
		}
	});

	test('should fail on mismatched kinds', () => {
		expect(() => recursiveMerge({list: [1]}, {list: {a: 1}}))
			.toThrow('[wiki-action] Cannot merge sequence with mapping at "list"');
		expect(() => recursiveMerge({}, [])).toThrow(MergeConflictError);
	});

});

describe('getPath', () => {

	const tree: ResultTree = {query: {tokens: {logintoken: 'abc'}, pages: [1]}};

	test('should find nested values', () => {
		expect(getPath(tree, ['query', 'tokens', 'logintoken'])).toBe('abc');
		expect(getPath(tree, [])).toBe(tree);
	});

	test('should return undefined for missing or non-mapping steps', () => {
		expect(getPath(tree, ['query', 'tokens', 'csrftoken'])).toBeUndefined();
		expect(getPath(tree, ['query', 'pages', '0'])).toBeUndefined();
		expect(getPath(tree, ['query', 'tokens', 'logintoken', 'x'])).toBeUndefined();
	});

});

describe('freezeTree', () => {

	test('should freeze nested mappings and sequences', () => {
		const tree: ResultTree = {query: {pages: [{pageid: 1}]}};
		expect(freezeTree(tree)).toBe(tree);
		expect(Object.isFrozen(tree)).toBe(true);
		expect(Object.isFrozen(getPath(tree, ['query']))).toBe(true);
		const pages = getPath(tree, ['query', 'pages']);
		expect(Object.isFrozen(pages)).toBe(true);
		expect(Array.isArray(pages) && Object.isFrozen(pages[0])).toBe(true);
	});

	test('should leave scalars as they are', () => {
		expect(freezeTree('Test')).toBe('Test');
		expect(freezeTree(null)).toBeNull();
	});

});

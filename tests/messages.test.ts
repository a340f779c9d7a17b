import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { deepFreeze, deepMerge, dig, normalizeMessages } from '../src/messages';
import { TaterError } from '../src/errors';
import type { MessageFunction, MessageTree } from '../src/types';
import { createWarnSpy, expectNoWarnings, expectSingleWarning, type SpyInstance } from './helpers';

describe('normalizeMessages', () => {
	let warnSpy: SpyInstance;

	beforeEach(() => {
		warnSpy = createWarnSpy();
	});

	afterEach(() => {
		warnSpy.mockRestore();
	});

	it('keeps strings, lists and nested mappings', () => {
		const tree = normalizeMessages({ en: { login: { title: 'Hello!' }, days: ['mon', 'tue'] } });
		expect(tree).toEqual({ en: { login: { title: 'Hello!' }, days: ['mon', 'tue'] } });
		expectNoWarnings(warnSpy);
	});

	it('stringifies Map keys, recursively', () => {
		const source = new Map<unknown, unknown>([
			['en', new Map<unknown, unknown>([[1, 'one'], [true, new Map([[2, 'two']])]])]
		]);
		expect(normalizeMessages(source)).toEqual({ en: { '1': 'one', true: { '2': 'two' } } });
	});

	it('turns numbers and booleans into strings', () => {
		expect(normalizeMessages({ en: { count: 3, on: false, big: 10n } })).toEqual({
			en: { count: '3', on: 'false', big: '10' }
		});
	});

	it('drops null and undefined entries', () => {
		expect(normalizeMessages({ en: { gone: null, missing: undefined, kept: 'yes' } })).toEqual({
			en: { kept: 'yes' }
		});
	});

	it('keeps functions as they are', () => {
		const fn: MessageFunction = (key) => key;
		const tree = normalizeMessages({ en: { fn } });
		expect(dig(tree, ['en', 'fn'])).toBe(fn);
	});

	it('resolves $fn references against the registered functions', () => {
		const greet: MessageFunction = (key) => `Hey ${key}!`;
		const tree = normalizeMessages({ en: { hi: { $fn: 'greet' } } }, { greet });
		expect(dig(tree, ['en', 'hi'])).toBe(greet);
	});

	it('throws for an unknown $fn name', () => {
		expect(() => normalizeMessages({ en: { hi: { $fn: 'nope' } } })).toThrow(
			"unknown message function 'nope' at 'en.hi'"
		);
	});

	it('throws for a $fn that is not a string', () => {
		expect(() => normalizeMessages({ en: { hi: { $fn: 42 } } })).toThrow(TaterError);
	});

	it('treats $fn next to other keys as an ordinary key', () => {
		expect(normalizeMessages({ en: { $fn: 'x', other: 'y' } })).toEqual({ en: { $fn: 'x', other: 'y' } });
	});

	it('skips unsafe keys with a warning', () => {
		const source = JSON.parse('{"en": {"__proto__": {"polluted": "yes"}, "ok": "fine"}}');
		expect(normalizeMessages(source)).toEqual({ en: { ok: 'fine' } });
		expectSingleWarning(warnSpy, "skipping unsafe key 'en.__proto__'");
	});

	it('throws for unsupported values', () => {
		expect(() => normalizeMessages({ en: { when: new Date(0) } })).toThrow(
			"unsupported message value at 'en.when': Date"
		);
	});

	it('throws when the top level is not a mapping', () => {
		expect(() => normalizeMessages(['en'])).toThrow('messages must be a mapping, got Array');
	});
});

describe('deepMerge', () => {
	it('deeply merges two trees, returning a new one', () => {
		const first: MessageTree = { one: 'one', two: { three: 'three' } };
		const second: MessageTree = { two: { four: 'four' } };

		const third = deepMerge(first, second);

		expect(third).toEqual({ one: 'one', two: { three: 'three', four: 'four' } });
		expect(first).toEqual({ one: 'one', two: { three: 'three' } });
		expect(second).toEqual({ two: { four: 'four' } });
	});

	it('lets the later value win when either side is not a mapping', () => {
		expect(deepMerge({ a: { b: 'x' } }, { a: 'flat' })).toEqual({ a: 'flat' });
		expect(deepMerge({ a: 'flat' }, { a: { b: 'x' } })).toEqual({ a: { b: 'x' } });
		expect(deepMerge({ a: ['1', '2'] }, { a: ['3'] })).toEqual({ a: ['3'] });
	});

	it('merges into frozen trees without touching them', () => {
		const frozen = deepFreeze({ en: { a: 'a' } });
		const merged = deepMerge(frozen, { en: { b: 'b' } });
		expect(merged).toEqual({ en: { a: 'a', b: 'b' } });
		expect(frozen).toEqual({ en: { a: 'a' } });
	});
});

describe('deepFreeze', () => {
	it('freezes mappings and lists, recursively', () => {
		const tree = deepFreeze(normalizeMessages({ en: { login: { title: 'Hello!' }, days: ['mon'] } }));
		const en = dig(tree, ['en']);
		const days = dig(tree, ['en', 'days']);

		expect(Object.isFrozen(tree)).toBe(true);
		expect(Object.isFrozen(en)).toBe(true);
		expect(Object.isFrozen(dig(tree, ['en', 'login']))).toBe(true);
		expect(Object.isFrozen(days)).toBe(true);
	});
});

describe('dig', () => {
	const tree: MessageTree = {
		level1: {
			level2: { level3: 'deep value' },
			value: 'level2 value',
			list: ['zero', 'one']
		},
		simple: 'simple value'
	};

	it('retrieves simple and nested keys', () => {
		expect(dig(tree, ['simple'])).toBe('simple value');
		expect(dig(tree, ['level1', 'value'])).toBe('level2 value');
		expect(dig(tree, ['level1', 'level2', 'level3'])).toBe('deep value');
	});

	it('indexes into lists with numeric segments', () => {
		expect(dig(tree, ['level1', 'list', '1'])).toBe('one');
		expect(dig(tree, ['level1', 'list', '5'])).toBeUndefined();
		expect(dig(tree, ['level1', 'list', 'length'])).toBeUndefined();
	});

	it('returns undefined for missing keys and for paths through strings', () => {
		expect(dig(tree, ['nonexistent'])).toBeUndefined();
		expect(dig(tree, ['level1', 'nonexistent'])).toBeUndefined();
		expect(dig(tree, ['simple', 'length'])).toBeUndefined();
		expect(dig(undefined, ['key'])).toBeUndefined();
	});

	it('does not match inherited or unsafe keys', () => {
		expect(dig(tree, ['toString'])).toBeUndefined();
		expect(dig(tree, ['__proto__'])).toBeUndefined();
		expect(dig(tree, ['level1', 'constructor'])).toBeUndefined();
	});
});

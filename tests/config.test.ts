import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { parseOptions } from '../src/config';
import type { MessageFunction } from '../src/types';
import { createWarnSpy, expectNoWarnings, expectSingleWarning, type SpyInstance } from './helpers';

describe('parseOptions', () => {
	let consoleSpy: SpyInstance;

	beforeEach(() => {
		consoleSpy = createWarnSpy();
	});

	afterEach(() => {
		consoleSpy.mockRestore();
	});

	describe('defaults', () => {
		it('returns defaults when called with an empty object', () => {
			const options = parseOptions({});
			expect(options.cascade).toBe(false);
			expect(options.debug).toBe(false);
			expect(options.locale).toBeUndefined();
			expect(options.path).toBeUndefined();
			expect(options.messages).toBeUndefined();
			expect(options.onMissingKey).toBeUndefined();
			expect(options.functions).toEqual({});
		});

		it('returns defaults when called with no arguments', () => {
			const options = parseOptions();
			expect(options.cascade).toBe(false);
			expect(options.debug).toBe(false);
		});

		it('passes valid values through', () => {
			const onMissingKey = (): void => {};
			const messages = { en: { title: 'Title' } };
			const options = parseOptions({
				path: './locales',
				messages,
				locale: 'fr',
				cascade: true,
				debug: true,
				onMissingKey
			});
			expect(options).toEqual({
				path: './locales',
				messages,
				locale: 'fr',
				cascade: true,
				debug: true,
				functions: {},
				onMissingKey
			});
			expectNoWarnings(consoleSpy);
		});
	});

	it('rejects options that are not an object', () => {
		expect(() => parseOptions('en')).toThrow('[tater] parseOptions: options must be an object, got string: "en"');
		expect(() => parseOptions(null)).toThrow('options must be an object');
		expect(() => parseOptions(['en'])).toThrow('options must be an object');
	});

	describe('locale', () => {
		it('trims whitespace and warns', () => {
			const options = parseOptions({ locale: '  en ' });
			expect(options.locale).toBe('en');
			expectSingleWarning(consoleSpy, "trimmed whitespace from locale '  en ' → 'en'");
		});

		it('throws for a non-string locale', () => {
			expect(() => parseOptions({ locale: 123 })).toThrow('locale must be a string, got number: 123');
		});

		it('throws for an empty locale', () => {
			expect(() => parseOptions({ locale: '' })).toThrow('locale must be a non-empty string');
			expect(() => parseOptions({ locale: '   ' })).toThrow('locale must be a non-empty string');
		});
	});

	describe('path', () => {
		it('throws for a non-string path', () => {
			expect(() => parseOptions({ path: 42 })).toThrow('path must be a non-empty string, got number: 42');
		});

		it('throws for a blank path', () => {
			expect(() => parseOptions({ path: ' ' })).toThrow('path must be a non-empty string');
		});
	});

	describe('messages', () => {
		it('accepts a Map', () => {
			const messages = new Map([['en', new Map([['title', 'Title']])]]);
			expect(parseOptions({ messages }).messages).toBe(messages);
		});

		it('throws for anything else', () => {
			expect(() => parseOptions({ messages: 'en.yml' })).toThrow('messages must be an object or a Map');
			expect(() => parseOptions({ messages: [] })).toThrow('messages must be an object or a Map');
		});
	});

	describe('booleans', () => {
		it('throws for a non-boolean cascade', () => {
			expect(() => parseOptions({ cascade: 'yes' })).toThrow('cascade must be a boolean, got string: "yes"');
		});

		it('throws for a non-boolean debug', () => {
			expect(() => parseOptions({ debug: 1 })).toThrow('debug must be a boolean, got number: 1');
		});
	});

	describe('callbacks', () => {
		it('throws for a non-function onMissingKey', () => {
			expect(() => parseOptions({ onMissingKey: 'log' })).toThrow('onMissingKey must be a function');
		});

		it('copies and freezes the registered functions', () => {
			const greet: MessageFunction = (key) => `Hey ${key}!`;
			const functions = { greet };
			const options = parseOptions({ functions });

			expect(options.functions).toEqual({ greet });
			expect(options.functions).not.toBe(functions);
			expect(Object.isFrozen(options.functions)).toBe(true);
		});

		it('throws when functions is not an object', () => {
			expect(() => parseOptions({ functions: ['greet'] })).toThrow('functions must be an object');
		});

		it('names the entry that is not a function', () => {
			expect(() => parseOptions({ functions: { greet: 'hello' } })).toThrow(
				'functions.greet must be a function, got string: "hello"'
			);
		});
	});

	it('returns a frozen object', () => {
		expect(Object.isFrozen(parseOptions({ locale: 'en' }))).toBe(true);
	});
});

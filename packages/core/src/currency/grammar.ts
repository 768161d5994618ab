import type { CurrencyConfigErrorCode, CurrencyOptions } from "../types";
import { CURRENCY_ERROR_CODES, CURRENCY_ERROR_MESSAGES } from "../types";

// ============================================================================
// Types
// ============================================================================

export type PatternBuildResult =
	| {
			ok: true;
			/** Anchored pattern; never carries the 'g' flag, so test() is stateless */
			pattern: RegExp;
			source: string;
	  }
	| {
			ok: false;
			code: CurrencyConfigErrorCode;
			message: string;
	  };

// ============================================================================
// Escaping
// ============================================================================

const WORD_CHAR = /^[\p{L}\p{N}_]$/u;

/**
 * Escape a string for literal use inside a pattern.
 */
export function escapeRegex(str: string): string {
	return str.replace(/[.*+?^${}()|[\]\\/-]/g, "\\$&");
}

/**
 * Escape a separator. Letters, digits and '_' go in as they are, anything
 * else gets a backslash.
 */
export function escapeSeparator(sep: string): string {
	return WORD_CHAR.test(sep) ? sep : `\\${sep}`;
}

function isSingleChar(str: string): boolean {
	return Array.from(str).length === 1;
}

function fail(code: CurrencyConfigErrorCode): PatternBuildResult {
	return { ok: false, code, message: CURRENCY_ERROR_MESSAGES[code] };
}

// ============================================================================
// Pattern Builder
// ============================================================================

/**
 * Build the anchored pattern accepting every amount written in the given
 * format. Misconfiguration is reported through the result, never thrown.
 *
 * The fragments are composed inside out: fraction digits, whole amount,
 * decimal part, digit-relative sign, spacing, symbol, then the outer sign or
 * parentheses. Rules about surrounding spaces and stray signs are not encoded
 * here; see ./guards.
 */
export function buildCurrencyPattern(options: CurrencyOptions): PatternBuildResult {
	const { digitsAfterDecimal, thousandsSeparator, decimalSeparator } = options;

	if (
		digitsAfterDecimal.length === 0 ||
		!digitsAfterDecimal.every((n) => Number.isInteger(n) && n > 0)
	) {
		return fail(CURRENCY_ERROR_CODES.CONFIG_DIGITS);
	}
	if (!isSingleChar(thousandsSeparator) || !isSingleChar(decimalSeparator)) {
		return fail(CURRENCY_ERROR_CODES.CONFIG_SEPARATOR);
	}

	const decimalDigits = digitsAfterDecimal.map((n) => `\\d{${n}}`).join("|");

	const symbol = `(${escapeRegex(options.symbol)})${options.requireSymbol ? "" : "?"}`;
	const negative = "-?";

	// '0', ungrouped digits, or digits grouped in threes
	const thousands = escapeSeparator(thousandsSeparator);
	const wholeAmount = `(0|[1-9]\\d*|[1-9]\\d{0,2}(${thousands}\\d{3})*)?`;

	const decimal = escapeSeparator(decimalSeparator);
	const decimalAmount = `(${decimal}(${decimalDigits}))${options.requireDecimal ? "" : "?"}`;

	let pattern = wholeAmount;
	if (options.allowDecimal || options.requireDecimal) {
		pattern += decimalAmount;
	}

	const signNextToDigits = options.negativeSignBeforeDigits || options.negativeSignAfterDigits;

	if (options.allowNegatives && !options.parensForNegatives) {
		if (options.negativeSignAfterDigits) {
			pattern += negative;
		} else if (options.negativeSignBeforeDigits) {
			pattern = negative + pattern;
		}
	}

	// First applicable rule wins
	if (options.allowNegativeSignPlaceholder) {
		pattern = `( ?-?)?${pattern}`;
	} else if (options.allowSpaceAfterSymbol) {
		pattern = ` ?${pattern}`;
	} else if (options.allowSpaceAfterDigits) {
		pattern += " ?";
	}

	if (options.symbolAfterDigits) {
		pattern += symbol;
	} else {
		pattern = symbol + pattern;
	}

	if (options.allowNegatives) {
		if (options.parensForNegatives) {
			pattern = `(\\(${pattern}\\)|${pattern})`;
		} else if (!signNextToDigits) {
			pattern = negative + pattern;
		}
	}

	const source = `^${pattern}$`;

	try {
		return { ok: true, pattern: new RegExp(source), source };
	} catch {
		return fail(CURRENCY_ERROR_CODES.CONFIG_PATTERN);
	}
}

// ============================================================================
// Cache
// ============================================================================

const cache = new Map<string, PatternBuildResult>();

function getCacheKey(options: CurrencyOptions): string {
	return JSON.stringify([
		options.symbol,
		options.requireSymbol,
		options.allowSpaceAfterSymbol,
		options.symbolAfterDigits,
		options.allowNegatives,
		options.parensForNegatives,
		options.negativeSignBeforeDigits,
		options.negativeSignAfterDigits,
		options.allowNegativeSignPlaceholder,
		options.thousandsSeparator,
		options.decimalSeparator,
		options.allowDecimal,
		options.requireDecimal,
		options.digitsAfterDecimal,
		options.allowSpaceAfterDigits,
	]);
}

/**
 * Build the pattern for a format, reusing a previous build for equal options.
 */
export function compileCurrencyPattern(options: CurrencyOptions): PatternBuildResult {
	const key = getCacheKey(options);
	const cached = cache.get(key);
	if (cached) return cached;

	const result = buildCurrencyPattern(options);
	cache.set(key, result);
	return result;
}

/**
 * Drop all cached patterns.
 */
export function clearCurrencyPatternCache(): void {
	cache.clear();
}

/**
 * Number of distinct formats currently cached.
 */
export function getCurrencyPatternCacheSize(): number {
	return cache.size;
}

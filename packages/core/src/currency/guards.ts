import type { CurrencyErrorCode, CurrencyGuardErrorCode, CurrencyOptions } from "../types";
import { CURRENCY_ERROR_CODES } from "../types";

// ============================================================================
// Types
// ============================================================================

export interface CurrencyGuard {
	name: string;
	/** Code reported when the check fails */
	code: CurrencyGuardErrorCode;
	/** Returns true when the value passes */
	check: (value: string, options: CurrencyOptions) => boolean;
}

const DIGIT = /\d/;

// ============================================================================
// Guards
// ============================================================================

/**
 * Checks run before the pattern, in order. The first failure decides the result.
 */
export const CURRENCY_GUARDS: readonly CurrencyGuard[] = [
	{
		name: "empty",
		code: CURRENCY_ERROR_CODES.EMPTY,
		check: (value) => value.length > 0,
	},
	{
		name: "surroundingSpace",
		code: CURRENCY_ERROR_CODES.SURROUNDING_SPACE,
		check: (value) => !value.startsWith(" ") && !value.endsWith(" "),
	},
	{
		name: "signSpace",
		code: CURRENCY_ERROR_CODES.SIGN_SPACE,
		check: (value) => !value.startsWith("- "),
	},
	{
		name: "digits",
		code: CURRENCY_ERROR_CODES.NO_DIGITS,
		check: (value) => DIGIT.test(value),
	},
	{
		name: "symbolSpace",
		code: CURRENCY_ERROR_CODES.SYMBOL_SPACE,
		check: (value, options) => {
			if (options.allowSpaceAfterSymbol || options.allowNegativeSignPlaceholder) return true;
			return !value.includes(`${options.symbol} `);
		},
	},
	{
		// 'R -10' is ambiguous once the space may stand in for the sign
		name: "symbolSpaceSign",
		code: CURRENCY_ERROR_CODES.SYMBOL_SPACE_SIGN,
		check: (value, options) => {
			if (!options.allowNegativeSignPlaceholder || options.allowSpaceAfterSymbol) return true;
			return !value.includes(`${options.symbol} -`);
		},
	},
	{
		name: "trailingSpace",
		code: CURRENCY_ERROR_CODES.TRAILING_SPACE,
		check: (value, options) => {
			if (options.allowSpaceAfterDigits || options.allowNegativeSignPlaceholder) return true;

			let rest = value;
			const { symbol } = options;
			if (symbol && rest.endsWith(symbol)) {
				rest = rest.slice(0, -symbol.length);
			}
			if (rest.endsWith(")")) {
				rest = rest.slice(0, -1);
			}
			return !rest.endsWith(" ");
		},
	},
];

/**
 * Run every guard against a value.
 * Returns 0 if all pass, otherwise the code of the first failing guard.
 */
export function runCurrencyGuards(value: string, options: CurrencyOptions): CurrencyErrorCode {
	for (const guard of CURRENCY_GUARDS) {
		if (!guard.check(value, options)) return guard.code;
	}
	return CURRENCY_ERROR_CODES.VALID;
}

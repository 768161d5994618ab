// ============================================================================
// Error Codes
// ============================================================================

export const CURRENCY_ERROR_CODES = {
	VALID: 0,
	EMPTY: 1,
	SURROUNDING_SPACE: 2,
	SIGN_SPACE: 3,
	NO_DIGITS: 4,
	SYMBOL_SPACE: 5,
	SYMBOL_SPACE_SIGN: 6,
	TRAILING_SPACE: 7,
	CONFIG_DIGITS: 8,
	CONFIG_SEPARATOR: 9,
	CONFIG_PATTERN: 10,
	PATTERN: 11,
} as const;

export type CurrencyErrorCode = (typeof CURRENCY_ERROR_CODES)[keyof typeof CURRENCY_ERROR_CODES];

/** Codes reported by the guard checks that run before pattern matching. */
export type CurrencyGuardErrorCode =
	| typeof CURRENCY_ERROR_CODES.EMPTY
	| typeof CURRENCY_ERROR_CODES.SURROUNDING_SPACE
	| typeof CURRENCY_ERROR_CODES.SIGN_SPACE
	| typeof CURRENCY_ERROR_CODES.NO_DIGITS
	| typeof CURRENCY_ERROR_CODES.SYMBOL_SPACE
	| typeof CURRENCY_ERROR_CODES.SYMBOL_SPACE_SIGN
	| typeof CURRENCY_ERROR_CODES.TRAILING_SPACE;

/** Codes reported when the options cannot be turned into a pattern. */
export type CurrencyConfigErrorCode =
	| typeof CURRENCY_ERROR_CODES.CONFIG_DIGITS
	| typeof CURRENCY_ERROR_CODES.CONFIG_SEPARATOR
	| typeof CURRENCY_ERROR_CODES.CONFIG_PATTERN;

export const CURRENCY_ERROR_MESSAGES: Record<Exclude<CurrencyErrorCode, 0>, string> = {
	[CURRENCY_ERROR_CODES.EMPTY]: "Value is empty",
	[CURRENCY_ERROR_CODES.SURROUNDING_SPACE]: "Value starts or ends with a space",
	[CURRENCY_ERROR_CODES.SIGN_SPACE]: "Negative sign is followed by a space",
	[CURRENCY_ERROR_CODES.NO_DIGITS]: "Value contains no digits",
	[CURRENCY_ERROR_CODES.SYMBOL_SPACE]: "Space after the currency symbol is not allowed",
	[CURRENCY_ERROR_CODES.SYMBOL_SPACE_SIGN]: "Space between the currency symbol and the sign",
	[CURRENCY_ERROR_CODES.TRAILING_SPACE]: "Space after the amount is not allowed",
	[CURRENCY_ERROR_CODES.CONFIG_DIGITS]: "digitsAfterDecimal must list positive integers",
	[CURRENCY_ERROR_CODES.CONFIG_SEPARATOR]: "Separators must be a single character",
	[CURRENCY_ERROR_CODES.CONFIG_PATTERN]: "Options produce an invalid pattern",
	[CURRENCY_ERROR_CODES.PATTERN]: "Value does not match the currency format",
};

// ============================================================================
// Currency Options
// ============================================================================

/**
 * Formatting rules for one currency convention.
 */
export interface CurrencyOptions {
	/** Currency symbol, may be several characters (e.g. '$', 'kr.') */
	readonly symbol: string;
	/** Reject amounts without the symbol. Default: false */
	readonly requireSymbol: boolean;
	/** Allow a space between the symbol and the amount. Default: false */
	readonly allowSpaceAfterSymbol: boolean;
	/** Symbol follows the amount instead of preceding it. Default: false */
	readonly symbolAfterDigits: boolean;
	/** Accept negative amounts at all. Default: true */
	readonly allowNegatives: boolean;
	/** Negatives are written as '(amount)'. Default: false */
	readonly parensForNegatives: boolean;
	/** Sign sits directly before the digits, after any symbol. Default: false */
	readonly negativeSignBeforeDigits: boolean;
	/** Sign sits directly after the digits. Default: false */
	readonly negativeSignAfterDigits: boolean;
	/** Accept a space where the sign could go ('R 123' as well as 'R-123'). Default: false */
	readonly allowNegativeSignPlaceholder: boolean;
	/** Grouping separator. Default: ',' */
	readonly thousandsSeparator: string;
	/** Fraction separator. Default: '.' */
	readonly decimalSeparator: string;
	/** Accept a fractional part. Default: true */
	readonly allowDecimal: boolean;
	/** Reject amounts without a fractional part. Default: false */
	readonly requireDecimal: boolean;
	/** Accepted fraction lengths. Default: [2] */
	readonly digitsAfterDecimal: readonly number[];
	/** Allow a space between the amount and a trailing symbol. Default: false */
	readonly allowSpaceAfterDigits: boolean;
}

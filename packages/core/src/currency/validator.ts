import { getCurrencyFormat } from "../locale/registry";
import type { CurrencyErrorCode } from "../types";
import { CURRENCY_ERROR_CODES } from "../types";
import { compileCurrencyPattern } from "./grammar";
import { runCurrencyGuards } from "./guards";
import { type CurrencyOptionsInput, resolveCurrencyOptions } from "./options";

// ============================================================================
// Validation
// ============================================================================

/**
 * Validate a currency string.
 * Returns 0 if valid, otherwise the code of the guard, configuration or
 * pattern failure (see CURRENCY_ERROR_CODES).
 */
export function validateCurrency(value: string, options?: CurrencyOptionsInput): CurrencyErrorCode {
	const resolved = resolveCurrencyOptions(options);

	const guardCode = runCurrencyGuards(value, resolved);
	if (guardCode !== CURRENCY_ERROR_CODES.VALID) return guardCode;

	const built = compileCurrencyPattern(resolved);
	if (!built.ok) return built.code;

	return built.pattern.test(value) ? CURRENCY_ERROR_CODES.VALID : CURRENCY_ERROR_CODES.PATTERN;
}

/**
 * Check whether a string is a well-formed amount in the given format
 * (US dollar when omitted). Never throws: bad options make every value invalid.
 *
 * ```ts
 * isCurrency("$10,123.45"); // true
 * isCurrency("$ 32.50"); // false
 * isCurrency("€ 1.234,56", { symbol: "€", thousandsSeparator: ".", decimalSeparator: ",", allowSpaceAfterSymbol: true }); // true
 * ```
 */
export function isCurrency(value: string, options?: CurrencyOptionsInput): boolean {
	return validateCurrency(value, options) === CURRENCY_ERROR_CODES.VALID;
}

/**
 * isCurrency with a registered locale format. Unknown ids use en-US.
 */
export function isCurrencyForLocale(value: string, localeId: string): boolean {
	return isCurrency(value, getCurrencyFormat(localeId));
}

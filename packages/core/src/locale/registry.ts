import { type CurrencyOptionsInput, createCurrencyOptions, resolveCurrencyOptions } from "../currency/options";
import type { CurrencyOptions } from "../types";
import type { LocaleCurrencyFormat } from "./types";

// ============================================================================
// Built-in Currency Formats
// ============================================================================

// -$1,234.56
const enUSFormat: LocaleCurrencyFormat = Object.freeze({
	id: "en-US",
	currency: "USD",
	options: createCurrencyOptions(),
});

// ¥-1,234.56
const zhCNFormat: LocaleCurrencyFormat = Object.freeze({
	id: "zh-CN",
	currency: "CNY",
	options: createCurrencyOptions({
		symbol: "¥",
		negativeSignBeforeDigits: true,
	}),
});

// R 1 234,56 / R-1 234,56
const enZAFormat: LocaleCurrencyFormat = Object.freeze({
	id: "en-ZA",
	currency: "ZAR",
	options: createCurrencyOptions({
		symbol: "R",
		negativeSignBeforeDigits: true,
		thousandsSeparator: " ",
		decimalSeparator: ",",
		allowNegativeSignPlaceholder: true,
	}),
});

// -€ 1.234,56
const itITFormat: LocaleCurrencyFormat = Object.freeze({
	id: "it-IT",
	currency: "EUR",
	options: createCurrencyOptions({
		symbol: "€",
		thousandsSeparator: ".",
		decimalSeparator: ",",
		allowSpaceAfterSymbol: true,
	}),
});

// -1.234,56 €
const elGRFormat: LocaleCurrencyFormat = Object.freeze({
	id: "el-GR",
	currency: "EUR",
	options: createCurrencyOptions({
		symbol: "€",
		symbolAfterDigits: true,
		thousandsSeparator: ".",
		decimalSeparator: ",",
		allowSpaceAfterDigits: true,
	}),
});

// kr. -1.234,56
const daDKFormat: LocaleCurrencyFormat = Object.freeze({
	id: "da-DK",
	currency: "DKK",
	options: createCurrencyOptions({
		symbol: "kr.",
		negativeSignBeforeDigits: true,
		thousandsSeparator: ".",
		decimalSeparator: ",",
		allowSpaceAfterSymbol: true,
	}),
});

// R$ 1.400,00, symbol required
const ptBRFormat: LocaleCurrencyFormat = Object.freeze({
	id: "pt-BR",
	currency: "BRL",
	options: createCurrencyOptions({
		symbol: "R$",
		requireSymbol: true,
		allowSpaceAfterSymbol: true,
		thousandsSeparator: ".",
		decimalSeparator: ",",
	}),
});

// ============================================================================
// Format Registry
// ============================================================================

const formatRegistry = new Map<string, LocaleCurrencyFormat>();

// Register built-in formats
formatRegistry.set("en-US", enUSFormat);
formatRegistry.set("en", enUSFormat); // Alias
formatRegistry.set("zh-CN", zhCNFormat);
formatRegistry.set("en-ZA", enZAFormat);
formatRegistry.set("it-IT", itITFormat);
formatRegistry.set("el-GR", elGRFormat);
formatRegistry.set("da-DK", daDKFormat);
formatRegistry.set("pt-BR", ptBRFormat);

// Default fallback format
const fallbackFormat = enUSFormat;

/**
 * Get the currency options registered for a locale.
 * Falls back to 'en-US' if the locale is not found.
 */
export function getCurrencyFormat(localeId: string): CurrencyOptions {
	return (formatRegistry.get(localeId) ?? fallbackFormat).options;
}

/**
 * Get the full registry entry for a locale, or undefined if not registered.
 */
export function getLocaleCurrencyFormat(localeId: string): LocaleCurrencyFormat | undefined {
	return formatRegistry.get(localeId);
}

/**
 * Check if a locale has a registered currency format.
 */
export function hasCurrencyFormat(localeId: string): boolean {
	return formatRegistry.has(localeId);
}

/**
 * Register or replace a locale's currency format.
 */
export function registerCurrencyFormat(
	localeId: string,
	currency: string,
	options: CurrencyOptionsInput
): void {
	formatRegistry.set(
		localeId,
		Object.freeze({
			id: localeId,
			currency,
			options: resolveCurrencyOptions(options),
		})
	);
}

/**
 * Get all registered locale IDs.
 */
export function getCurrencyFormatIds(): string[] {
	return Array.from(formatRegistry.keys());
}

// ============================================================================
// Exports
// ============================================================================

export { enUSFormat, zhCNFormat, enZAFormat, itITFormat, elGRFormat, daDKFormat, ptBRFormat };

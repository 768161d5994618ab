// @valuta/core - locale-aware currency string validation

// Currency exports
export {
	isCurrency,
	isCurrencyForLocale,
	validateCurrency,
	buildCurrencyPattern,
	compileCurrencyPattern,
	clearCurrencyPatternCache,
	getCurrencyPatternCacheSize,
	escapeRegex,
	escapeSeparator,
	CURRENCY_GUARDS,
	runCurrencyGuards,
	CurrencyFormat,
	DEFAULT_CURRENCY_OPTIONS,
	createCurrencyOptions,
	resolveCurrencyOptions,
} from "./currency";
export type { PatternBuildResult, CurrencyGuard, CurrencyOptionsInput } from "./currency";

// Locale exports
export {
	getCurrencyFormat,
	getLocaleCurrencyFormat,
	hasCurrencyFormat,
	registerCurrencyFormat,
	getCurrencyFormatIds,
	enUSFormat,
	zhCNFormat,
	enZAFormat,
	itITFormat,
	elGRFormat,
	daDKFormat,
	ptBRFormat,
} from "./locale";
export type { LocaleCurrencyFormat } from "./locale";

// Type exports
export * from "./types";

// Main exports
export { isCurrency, isCurrencyForLocale, validateCurrency } from "./validator";
export {
	buildCurrencyPattern,
	compileCurrencyPattern,
	clearCurrencyPatternCache,
	getCurrencyPatternCacheSize,
	escapeRegex,
	escapeSeparator,
} from "./grammar";
export type { PatternBuildResult } from "./grammar";
export { CURRENCY_GUARDS, runCurrencyGuards } from "./guards";
export type { CurrencyGuard } from "./guards";
export {
	CurrencyFormat,
	DEFAULT_CURRENCY_OPTIONS,
	createCurrencyOptions,
	resolveCurrencyOptions,
} from "./options";
export type { CurrencyOptionsInput } from "./options";

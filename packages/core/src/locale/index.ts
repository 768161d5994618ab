// Types
export type { LocaleCurrencyFormat } from "./types";

// Registry
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
} from "./registry";

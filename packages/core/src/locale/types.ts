import type { CurrencyOptions } from "../types";

// ============================================================================
// Locale Currency Format Types
// ============================================================================

/**
 * A named currency convention.
 */
export interface LocaleCurrencyFormat {
	/** Locale identifier (e.g., 'en-US', 'da-DK') */
	readonly id: string;
	/** ISO 4217 code of the currency the format is written for */
	readonly currency: string;
	/** Formatting rules */
	readonly options: CurrencyOptions;
}

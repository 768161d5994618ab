import type { CurrencyOptions } from "../types";

// ============================================================================
// Defaults
// ============================================================================

/** US dollar: '-$1,234.56', symbol optional, exactly two decimals. */
export const DEFAULT_CURRENCY_OPTIONS: CurrencyOptions = Object.freeze({
	symbol: "$",
	requireSymbol: false,
	allowSpaceAfterSymbol: false,
	symbolAfterDigits: false,
	allowNegatives: true,
	parensForNegatives: false,
	negativeSignBeforeDigits: false,
	negativeSignAfterDigits: false,
	allowNegativeSignPlaceholder: false,
	thousandsSeparator: ",",
	decimalSeparator: ".",
	allowDecimal: true,
	requireDecimal: false,
	digitsAfterDecimal: Object.freeze([2]),
	allowSpaceAfterDigits: false,
});

/**
 * Merge overrides onto the defaults and freeze the result.
 * Nothing is validated here; bad combinations surface when the pattern is built.
 */
export function createCurrencyOptions(overrides?: Partial<CurrencyOptions>): CurrencyOptions {
	const d = DEFAULT_CURRENCY_OPTIONS;

	return Object.freeze({
		symbol: overrides?.symbol ?? d.symbol,
		requireSymbol: overrides?.requireSymbol ?? d.requireSymbol,
		allowSpaceAfterSymbol: overrides?.allowSpaceAfterSymbol ?? d.allowSpaceAfterSymbol,
		symbolAfterDigits: overrides?.symbolAfterDigits ?? d.symbolAfterDigits,
		allowNegatives: overrides?.allowNegatives ?? d.allowNegatives,
		parensForNegatives: overrides?.parensForNegatives ?? d.parensForNegatives,
		negativeSignBeforeDigits: overrides?.negativeSignBeforeDigits ?? d.negativeSignBeforeDigits,
		negativeSignAfterDigits: overrides?.negativeSignAfterDigits ?? d.negativeSignAfterDigits,
		allowNegativeSignPlaceholder:
			overrides?.allowNegativeSignPlaceholder ?? d.allowNegativeSignPlaceholder,
		thousandsSeparator: overrides?.thousandsSeparator ?? d.thousandsSeparator,
		decimalSeparator: overrides?.decimalSeparator ?? d.decimalSeparator,
		allowDecimal: overrides?.allowDecimal ?? d.allowDecimal,
		requireDecimal: overrides?.requireDecimal ?? d.requireDecimal,
		// Own frozen copy of the caller's array
		digitsAfterDecimal: Object.freeze([...(overrides?.digitsAfterDecimal ?? d.digitsAfterDecimal)]),
		allowSpaceAfterDigits: overrides?.allowSpaceAfterDigits ?? d.allowSpaceAfterDigits,
	});
}

// ============================================================================
// Fluent Builder
// ============================================================================

/**
 * Immutable builder over {@link CurrencyOptions}. Every setter returns a new
 * instance:
 *
 * ```ts
 * const euro = new CurrencyFormat().symbol("€").thousandsSeparator(".").decimalSeparator(",");
 * isCurrency("€1.234,56", euro); // true
 * ```
 */
export class CurrencyFormat {
	readonly options: CurrencyOptions;

	constructor(options?: Partial<CurrencyOptions>) {
		this.options = createCurrencyOptions(options);
	}

	static from(options: Partial<CurrencyOptions>): CurrencyFormat {
		return new CurrencyFormat(options);
	}

	symbol(symbol: string): CurrencyFormat {
		return this.with({ symbol });
	}

	requireSymbol(requireSymbol: boolean): CurrencyFormat {
		return this.with({ requireSymbol });
	}

	allowSpaceAfterSymbol(allowSpaceAfterSymbol: boolean): CurrencyFormat {
		return this.with({ allowSpaceAfterSymbol });
	}

	symbolAfterDigits(symbolAfterDigits: boolean): CurrencyFormat {
		return this.with({ symbolAfterDigits });
	}

	allowNegatives(allowNegatives: boolean): CurrencyFormat {
		return this.with({ allowNegatives });
	}

	parensForNegatives(parensForNegatives: boolean): CurrencyFormat {
		return this.with({ parensForNegatives });
	}

	negativeSignBeforeDigits(negativeSignBeforeDigits: boolean): CurrencyFormat {
		return this.with({ negativeSignBeforeDigits });
	}

	negativeSignAfterDigits(negativeSignAfterDigits: boolean): CurrencyFormat {
		return this.with({ negativeSignAfterDigits });
	}

	allowNegativeSignPlaceholder(allowNegativeSignPlaceholder: boolean): CurrencyFormat {
		return this.with({ allowNegativeSignPlaceholder });
	}

	thousandsSeparator(thousandsSeparator: string): CurrencyFormat {
		return this.with({ thousandsSeparator });
	}

	decimalSeparator(decimalSeparator: string): CurrencyFormat {
		return this.with({ decimalSeparator });
	}

	allowDecimal(allowDecimal: boolean): CurrencyFormat {
		return this.with({ allowDecimal });
	}

	requireDecimal(requireDecimal: boolean): CurrencyFormat {
		return this.with({ requireDecimal });
	}

	digitsAfterDecimal(digitsAfterDecimal: readonly number[]): CurrencyFormat {
		return this.with({ digitsAfterDecimal });
	}

	allowSpaceAfterDigits(allowSpaceAfterDigits: boolean): CurrencyFormat {
		return this.with({ allowSpaceAfterDigits });
	}

	toOptions(): CurrencyOptions {
		return this.options;
	}

	private with(patch: Partial<CurrencyOptions>): CurrencyFormat {
		return new CurrencyFormat({ ...this.options, ...patch });
	}
}

// ============================================================================
// Resolution
// ============================================================================

/** Anything the validator accepts as options. */
export type CurrencyOptionsInput = Partial<CurrencyOptions> | CurrencyFormat;

/**
 * Turn caller input into a complete options value. Missing input means the
 * US dollar defaults.
 */
export function resolveCurrencyOptions(input?: CurrencyOptionsInput): CurrencyOptions {
	if (input === undefined) return DEFAULT_CURRENCY_OPTIONS;
	if (input instanceof CurrencyFormat) return input.options;
	return createCurrencyOptions(input);
}

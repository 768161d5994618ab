import { describe, expect, test } from "vitest";
import { CURRENCY_ERROR_CODES } from "../types";
import { CURRENCY_GUARDS, runCurrencyGuards } from "./guards";
import { DEFAULT_CURRENCY_OPTIONS, createCurrencyOptions } from "./options";

const defaults = DEFAULT_CURRENCY_OPTIONS;

describe("CURRENCY_GUARDS", () => {
	test("run in a fixed order", () => {
		expect(CURRENCY_GUARDS.map((g) => g.name)).toEqual([
			"empty",
			"surroundingSpace",
			"signSpace",
			"digits",
			"symbolSpace",
			"symbolSpaceSign",
			"trailingSpace",
		]);
	});
});

describe("runCurrencyGuards", () => {
	test("passes a plain amount", () => {
		expect(runCurrencyGuards("$10.00", defaults)).toBe(CURRENCY_ERROR_CODES.VALID);
	});

	test("rejects the empty string", () => {
		expect(runCurrencyGuards("", defaults)).toBe(CURRENCY_ERROR_CODES.EMPTY);
	});

	test("rejects leading and trailing spaces", () => {
		expect(runCurrencyGuards(" 1.00", defaults)).toBe(CURRENCY_ERROR_CODES.SURROUNDING_SPACE);
		expect(runCurrencyGuards("1.00 ", defaults)).toBe(CURRENCY_ERROR_CODES.SURROUNDING_SPACE);
		expect(runCurrencyGuards(" ", defaults)).toBe(CURRENCY_ERROR_CODES.SURROUNDING_SPACE);
	});

	test("rejects a sign followed by a space", () => {
		expect(runCurrencyGuards("- 1", defaults)).toBe(CURRENCY_ERROR_CODES.SIGN_SPACE);
		expect(runCurrencyGuards("- $", defaults)).toBe(CURRENCY_ERROR_CODES.SIGN_SPACE);
	});

	test("requires at least one digit", () => {
		expect(runCurrencyGuards("$", defaults)).toBe(CURRENCY_ERROR_CODES.NO_DIGITS);
		expect(runCurrencyGuards("-$.,", defaults)).toBe(CURRENCY_ERROR_CODES.NO_DIGITS);
	});

	describe("space after symbol", () => {
		test("rejected by default", () => {
			expect(runCurrencyGuards("$ 32.50", defaults)).toBe(CURRENCY_ERROR_CODES.SYMBOL_SPACE);
		});

		test("allowed with allowSpaceAfterSymbol", () => {
			const options = createCurrencyOptions({ allowSpaceAfterSymbol: true });
			expect(runCurrencyGuards("$ 32.50", options)).toBe(CURRENCY_ERROR_CODES.VALID);
		});

		test("allowed with allowNegativeSignPlaceholder", () => {
			const options = createCurrencyOptions({ symbol: "R", allowNegativeSignPlaceholder: true });
			expect(runCurrencyGuards("R 123", options)).toBe(CURRENCY_ERROR_CODES.VALID);
		});
	});

	describe("space between symbol and sign", () => {
		const placeholder = createCurrencyOptions({ symbol: "R", allowNegativeSignPlaceholder: true });

		test("rejected in placeholder mode", () => {
			expect(runCurrencyGuards("R -10123", placeholder)).toBe(
				CURRENCY_ERROR_CODES.SYMBOL_SPACE_SIGN
			);
		});

		test("allowed once a space after the symbol is allowed", () => {
			const options = createCurrencyOptions({
				symbol: "R",
				allowNegativeSignPlaceholder: true,
				allowSpaceAfterSymbol: true,
			});
			expect(runCurrencyGuards("R -10123", options)).toBe(CURRENCY_ERROR_CODES.VALID);
		});
	});

	describe("trailing space", () => {
		const suffix = createCurrencyOptions({ symbol: "€", symbolAfterDigits: true });

		test("rejected before a trailing symbol", () => {
			expect(runCurrencyGuards("10 €", suffix)).toBe(CURRENCY_ERROR_CODES.TRAILING_SPACE);
		});

		test("rejected inside closing parenthesis", () => {
			expect(runCurrencyGuards("(123 )", defaults)).toBe(CURRENCY_ERROR_CODES.TRAILING_SPACE);
		});

		test("allowed with allowSpaceAfterDigits", () => {
			const options = createCurrencyOptions({
				symbol: "€",
				symbolAfterDigits: true,
				allowSpaceAfterDigits: true,
			});
			expect(runCurrencyGuards("10 €", options)).toBe(CURRENCY_ERROR_CODES.VALID);
		});
	});

	test("does not depend on earlier calls", () => {
		expect(runCurrencyGuards("", defaults)).toBe(CURRENCY_ERROR_CODES.EMPTY);
		expect(runCurrencyGuards("$1.00", defaults)).toBe(CURRENCY_ERROR_CODES.VALID);
		expect(runCurrencyGuards("", defaults)).toBe(CURRENCY_ERROR_CODES.EMPTY);
	});
});

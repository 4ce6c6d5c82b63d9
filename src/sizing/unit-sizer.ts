/**
 * Turtle unit sizer.
 *
 *   quantity = max(1, floor(equity × riskPct / 100 / (N × pointValue)))
 *
 * Zero when N, equity or the point value is not positive.
 */

import type { SizingConfig } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import { ConfigError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import type { UnitSizer, UnitSizingInput, UnitSizingResult } from "./types.js";

export class TurtleUnitSizer implements UnitSizer {
	readonly name = "TurtleUnit";
	private readonly riskFraction: Decimal;
	private readonly equity: Decimal;
	private readonly defaultPointValue: Decimal;
	private readonly pointValues: ReadonlyMap<string, Decimal>;

	private constructor(
		riskFraction: Decimal,
		equity: Decimal,
		defaultPointValue: Decimal,
		pointValues: ReadonlyMap<string, Decimal>,
	) {
		this.riskFraction = riskFraction;
		this.equity = equity;
		this.defaultPointValue = defaultPointValue;
		this.pointValues = pointValues;
	}

	static create(config: SizingConfig): Result<TurtleUnitSizer, ConfigError> {
		if (config.riskPerUnitPct <= 0 || config.riskPerUnitPct > 100) {
			return err(
				new ConfigError("sizing.riskPerUnitPct must be in (0, 100]", {
					riskPerUnitPct: config.riskPerUnitPct,
				}),
			);
		}
		if (!Decimal.isDecimalString(config.accountEquity)) {
			return err(
				new ConfigError("sizing.accountEquity must be a decimal string", {
					accountEquity: config.accountEquity,
				}),
			);
		}

		const invalid = (label: string, value: string) =>
			new ConfigError(`sizing point value for ${label} must be a positive decimal`, { value });
		if (!isPositiveDecimal(config.defaultPointValue)) {
			return err(invalid("the default", config.defaultPointValue));
		}
		const pointValues = new Map<string, Decimal>();
		for (const [symbol, raw] of Object.entries(config.pointValues)) {
			if (!isPositiveDecimal(raw)) return err(invalid(symbol, raw));
			pointValues.set(symbol.toUpperCase(), Decimal.from(raw));
		}

		const fraction = Decimal.from(config.riskPerUnitPct).div(Decimal.from(100));
		return ok(
			new TurtleUnitSizer(
				fraction,
				Decimal.from(config.accountEquity),
				Decimal.from(config.defaultPointValue),
				pointValues,
			),
		);
	}

	size(input: UnitSizingInput): UnitSizingResult {
		const riskBudget = input.equity.mul(this.riskFraction);
		const dollarVolatility = input.n.mul(input.pointValue);

		if (!input.n.isPositive() || !input.equity.isPositive() || !input.pointValue.isPositive()) {
			return { quantity: Decimal.zero(), riskBudget, dollarVolatility };
		}

		const raw = riskBudget.div(dollarVolatility).floor();
		return { quantity: Decimal.max(Decimal.one(), raw), riskBudget, dollarVolatility };
	}

	/** Quantity for one unit of `symbol` at the configured account equity. */
	unitQuantity(symbol: string, n: Decimal): Decimal {
		return this.size({ equity: this.equity, n, pointValue: this.pointValueFor(symbol) }).quantity;
	}

	pointValueFor(symbol: string): Decimal {
		return this.pointValues.get(symbol.toUpperCase()) ?? this.defaultPointValue;
	}
}

function isPositiveDecimal(value: string): boolean {
	return Decimal.isDecimalString(value) && Decimal.from(value).isPositive();
}

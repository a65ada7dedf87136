import Decimal from 'decimal.js-light';

Decimal.set({ precision: 40, rounding: Decimal.ROUND_HALF_UP });

type Numeric = number | string | Decimal;

// Quantities and costs stay plain numbers at the edges; arithmetic goes through Decimal.
export const roundTo = (value: Numeric, places: number): number =>
  new Decimal(value).toDecimalPlaces(places).toNumber();

export const subtract = (a: Numeric, b: Numeric, places: number): number =>
  new Decimal(a).minus(b).toDecimalPlaces(places).toNumber();

export const multiply = (a: Numeric, b: Numeric, places: number): number =>
  new Decimal(a).times(b).toDecimalPlaces(places).toNumber();

export const sum = (values: Numeric[], places: number): number =>
  values
    .reduce<Decimal>((acc, v) => acc.plus(v), new Decimal(0))
    .toDecimalPlaces(places)
    .toNumber();

// Monetary amounts are reported with 4 places; callers round for display.
export const MONEY_PLACES = 4;

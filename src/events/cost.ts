const MICROS_PER_UNIT = 1_000_000;
const COST_PATTERN = /^(-)?\$?(\d*)(?:\.(\d*))?(?:e([+-]?\d+))?$/i;
const MAX_INTEGER_DIGITS = 30;

export type CostParse =
  | { readonly ok: true; readonly micros: number }
  | { readonly ok: false; readonly reason: "negative" | "not a number" };

/** Move the decimal point of `whole.fraction` right by `exponent` places. */
function shiftPoint(
  whole: string,
  fraction: string,
  exponent: number,
): { whole: string; fraction: string } | null {
  if (exponent === 0) return { whole, fraction };
  const digits = whole + fraction;
  const point = whole.length + exponent;
  if (point > MAX_INTEGER_DIGITS) return null;
  // Everything lands past the seventh decimal place.
  if (point < -7) return { whole: "", fraction: "" };
  if (point <= 0) return { whole: "", fraction: "0".repeat(-point) + digits };
  if (point >= digits.length) return { whole: digits.padEnd(point, "0"), fraction: "" };
  return { whole: digits.slice(0, point), fraction: digits.slice(point) };
}

/**
 * Parse a decimal cost cell into integer millionths. Empty and "NaN" cells
 * are zero; exponent notation is accepted; digits past the sixth decimal
 * place round half-up.
 */
export function parseCostMicros(raw: string | undefined): CostParse {
  const text = (raw ?? "").trim().replace(/,/g, "");
  if (text === "" || text.toLowerCase() === "nan") return { ok: true, micros: 0 };

  const match = COST_PATTERN.exec(text);
  if (!match) return { ok: false, reason: "not a number" };

  const [, minus, wholeText = "", fractionText = "", exponent] = match;
  if (wholeText === "" && fractionText === "") return { ok: false, reason: "not a number" };

  const shifted = shiftPoint(wholeText, fractionText, exponent === undefined ? 0 : Number(exponent));
  if (!shifted) return { ok: false, reason: "not a number" };
  const { whole, fraction } = shifted;

  const head = fraction.slice(0, 6).padEnd(6, "0");
  const roundUp = (fraction[6] ?? "0") >= "5" ? 1 : 0;
  const micros = Number(whole || "0") * MICROS_PER_UNIT + Number(head) + roundUp;

  if (!Number.isSafeInteger(micros)) return { ok: false, reason: "not a number" };
  if (minus && micros > 0) return { ok: false, reason: "negative" };
  return { ok: true, micros };
}

export function microsToAmount(micros: number): number {
  return micros / MICROS_PER_UNIT;
}

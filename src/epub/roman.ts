const NUMERALS: [number, string][] = [
  [1000, "M"],
  [900, "CM"],
  [500, "D"],
  [400, "CD"],
  [100, "C"],
  [90, "XC"],
  [50, "L"],
  [40, "XL"],
  [10, "X"],
  [9, "IX"],
  [5, "V"],
  [4, "IV"],
  [1, "I"],
];

/**
 * Roman numeral for a part number (1 → "I", 14 → "XIV")
 */
export function toRoman(value: number): string {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`Cannot write ${value} as a roman numeral`);
  }

  let remaining = value;
  let result = "";
  for (const [amount, numeral] of NUMERALS) {
    while (remaining >= amount) {
      result += numeral;
      remaining -= amount;
    }
  }
  return result;
}

/** Column heading for a category weight, e.g. 0.6 -> "60 %". */
export function percentHeading(weight: number): string {
  return `${Math.floor(weight * 100 + 1e-9)} %`;
}

export function formatHours(value: number, decimals: number): string {
  const text = value.toFixed(decimals);
  return isNegativeZero(text) ? text.slice(1) : text;
}

/** Signed form used by the Delta row: "+0.5", "-1.0", never "-0.0". */
export function formatSigned(value: number, decimals: number): string {
  const text = formatHours(value, decimals);
  return text.startsWith('-') ? text : `+${text}`;
}

function isNegativeZero(text: string): boolean {
  return /^-0(\.0+)?$/.test(text);
}

/**
 * Cross-Reference Resolver
 *
 * Finds the value another parameter was given earlier in the document, for
 * criteria such as "S/B = VEN2.01/02".
 */

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Scans backward from the line above `fromIndex` for "PARAM_KEY = VALUE" and
 * returns the first token of VALUE. The key match is case-insensitive and may
 * sit anywhere on the line.
 *
 * Returns null when the parameter is never bound above `fromIndex`.
 */
export function resolveReference(
  document: readonly string[],
  fromIndex: number,
  paramKey: string
): string | null {
  const pattern = new RegExp(`${escapeRegExp(paramKey)}\\s*=\\s*(.+?)(?:\\s|$)`, "i");
  const start = Math.min(fromIndex, document.length) - 1;

  for (let i = start; i >= 0; i--) {
    const match = document[i].trim().match(pattern);
    if (match) {
      return match[1].trim();
    }
  }
  return null;
}

/**
 * Compares a measured value with a resolved reference. Both sides drop spaces
 * and colons; when both are hexadecimal they compare as integers, so "001D"
 * equals "1d".
 */
export function matchesReference(value: string, reference: string): boolean {
  const normalizedValue = value.replace(/[ :]/g, "").toLowerCase();
  const normalizedReference = reference.replace(/[ :]/g, "").toLowerCase();

  const hex = /^[0-9a-f]+$/;
  if (hex.test(normalizedValue) && hex.test(normalizedReference)) {
    return BigInt(`0x${normalizedValue}`) === BigInt(`0x${normalizedReference}`);
  }
  return normalizedValue === normalizedReference;
}

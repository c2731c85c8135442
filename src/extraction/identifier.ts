/**
 * Identifier Matching
 *
 * Receipts print the donor's tax identifier right after a fixed label:
 *
 *   Unique Identification Number  ABCDE1234F
 *
 * The identifier is 5 uppercase letters, 4 digits and 1 uppercase letter.
 * A code that runs straight into more letters or digits is rejected rather
 * than truncated to its first 10 characters.
 */

export const IDENTIFIER_LABEL = 'Unique Identification Number';

export const IDENTIFIER_PATTERN = new RegExp(
  `${IDENTIFIER_LABEL}\\s+([A-Z]{5}[0-9]{4}[A-Z])(?![A-Za-z0-9])`,
);

/** True when the value is a well-formed 10-character identifier */
export function isIdentifier(value: string): boolean {
  return /^[A-Z]{5}[0-9]{4}[A-Z]$/.test(value);
}

/**
 * Returns the identifier following the first label occurrence that carries
 * a well-formed code, or null when the text has none.
 */
export function findIdentifier(text: string): string | null {
  const match = IDENTIFIER_PATTERN.exec(text);
  return match ? match[1] : null;
}

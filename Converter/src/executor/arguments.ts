/**
 * Splits an argument string into argv tokens the way the Microsoft C runtime
 * does, which is also how Ghostscript's own command line is parsed on Windows.
 *
 * - whitespace outside quotes separates tokens
 * - `"` toggles quoting and is removed
 * - 2n backslashes before `"` become n backslashes, the quote still toggles
 * - 2n+1 backslashes before `"` become n backslashes and a literal quote
 * - backslashes not followed by `"` are literal (Windows paths survive intact)
 */
export function splitArguments(input: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let inToken = false;
  let inQuotes = false;

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (ch === '\\') {
      let slashes = 0;
      while (input[i] === '\\') {
        slashes++;
        i++;
      }
      if (input[i] === '"') {
        current += '\\'.repeat(Math.floor(slashes / 2));
        if (slashes % 2 === 1) {
          current += '"';
        } else {
          inQuotes = !inQuotes;
        }
      } else {
        current += '\\'.repeat(slashes);
        i--;
      }
      inToken = true;
      continue;
    }

    if (ch === '"') {
      inQuotes = !inQuotes;
      inToken = true;
      continue;
    }

    if (!inQuotes && /\s/.test(ch)) {
      if (inToken) {
        tokens.push(current);
        current = '';
        inToken = false;
      }
      continue;
    }

    current += ch;
    inToken = true;
  }

  if (inToken) {
    tokens.push(current);
  }
  return tokens;
}

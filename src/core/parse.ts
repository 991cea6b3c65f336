const DOUBLE_QUOTE_ESCAPES = new Set(['"', '\\', '$', '`']);

export function parseCommandLine(input: string): string[] {
  const tokens: string[] = [];
  let current = '';
  // a quoted empty string still yields a token
  let inToken = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < input.length; i++) {
    const char = input[i];

    if (quote === "'") {
      if (char === quote) {
        quote = null;
        continue;
      }
      current += char;
      continue;
    }

    if (quote === '"') {
      if (char === quote) {
        quote = null;
        continue;
      }
      if (char === '\\' && i + 1 < input.length) {
        const next = input[i + 1];
        if (DOUBLE_QUOTE_ESCAPES.has(next)) {
          current += next;
          i++;
          continue;
        }
      }
      current += char;
      continue;
    }

    if (char === '"' || char === "'") {
      quote = char;
      inToken = true;
      continue;
    }

    if (char === '\\' && i + 1 < input.length) {
      current += input[i + 1];
      inToken = true;
      i++;
      continue;
    }

    if (/\s/.test(char)) {
      if (inToken) {
        tokens.push(current);
        current = '';
        inToken = false;
      }
      continue;
    }

    current += char;
    inToken = true;
  }

  if (quote) {
    throw new Error(`Unclosed quote: ${quote}`);
  }
  if (inToken) {
    tokens.push(current);
  }

  return tokens;
}

const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;

export function shellQuote(value: string): string {
  if (value.length > 0 && SAFE_WORD.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

export function formatCommandLine(command: string, args: string[]): string {
  return [command, ...args].map((word) => shellQuote(word)).join(" ");
}

// Characters a backslash escapes inside double quotes (POSIX sh rules).
const DOUBLE_QUOTE_ESCAPES = new Set(["\\", '"', "$", "`", "\n"]);

/**
 * Splits a string into words the way a POSIX shell would, minus expansion:
 * whitespace separates words, single quotes are literal, double quotes allow
 * backslash escapes of `\ " $ \``, and a bare backslash escapes any character.
 */
export function splitShellWords(input: string): string[] {
  const words: string[] = [];
  let current = "";
  let inWord = false;
  let quote: "'" | '"' | null = null;

  for (let i = 0; i < input.length; i += 1) {
    const ch = input[i] ?? "";

    if (quote === "'") {
      if (ch === "'") {
        quote = null;
      } else {
        current += ch;
      }
      continue;
    }

    if (quote === '"') {
      if (ch === '"') {
        quote = null;
      } else if (ch === "\\" && DOUBLE_QUOTE_ESCAPES.has(input[i + 1] ?? "")) {
        i += 1;
        current += input[i] ?? "";
      } else {
        current += ch;
      }
      continue;
    }

    if (/\s/.test(ch)) {
      if (inWord) {
        words.push(current);
        current = "";
        inWord = false;
      }
      continue;
    }

    inWord = true;
    if (ch === "'" || ch === '"') {
      quote = ch;
    } else if (ch === "\\") {
      if (i + 1 >= input.length) {
        throw new Error(`No escaped character after trailing backslash: ${input}`);
      }
      i += 1;
      current += input[i] ?? "";
    } else {
      current += ch;
    }
  }

  if (quote) {
    throw new Error(`No closing quotation (${quote}) in: ${input}`);
  }
  if (inWord) {
    words.push(current);
  }
  return words;
}

/**
 * Command parsing and message text helpers
 */

export const TELEGRAM_TEXT_LIMIT = 4096;

export interface ParsedCommand {
  /** Lowercase, without the slash or a trailing @botname */
  name: string;
  args: string[];
  /** Everything after the command, trimmed */
  rest: string;
}

/**
 * Split on spaces, keeping "quoted phrases" together. A quote only opens a
 * phrase at the start of a word, so apostrophes inside words survive.
 */
export function parseQuotedArgs(text: string): string[] {
  const args: string[] = [];
  let current = '';
  let quoteChar = '';

  for (const char of text) {
    if (quoteChar) {
      if (char === quoteChar) {
        quoteChar = '';
        if (current) {
          args.push(current);
          current = '';
        }
      } else {
        current += char;
      }
    } else if ((char === '"' || char === "'") && current === '') {
      quoteChar = char;
    } else if (/\s/.test(char)) {
      if (current) {
        args.push(current);
        current = '';
      }
    } else {
      current += char;
    }
  }

  if (current) {
    args.push(current);
  }
  return args;
}

/**
 * Parse `/name@bot arg "two words"`. Returns null for anything else.
 */
export function parseCommand(text: string): ParsedCommand | null {
  const match = /^\/([A-Za-z0-9_]+)(?:@[A-Za-z0-9_]+)?(?:\s+([\s\S]*))?$/.exec(text.trim());
  if (!match?.[1]) {
    return null;
  }
  const rest = (match[2] ?? '').trim();
  return { name: match[1].toLowerCase(), args: parseQuotedArgs(rest), rest };
}

/**
 * Take a leading `-x` flag from `args` if it is one of `allowed`
 */
export function takeFlag<F extends string>(args: readonly string[], allowed: readonly F[]): { flag: F | null; rest: string[] } {
  const [first, ...rest] = args;
  const flag = allowed.find((candidate) => candidate === first);
  return flag !== undefined ? { flag, rest } : { flag: null, rest: [...args] };
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Break `text` into parts of at most `limit` characters, on line boundaries
 * where possible. Callers keep HTML tags within a single line.
 */
export function splitMessage(text: string, limit: number = TELEGRAM_TEXT_LIMIT): string[] {
  if (text.length <= limit) {
    return [text];
  }

  const parts: string[] = [];
  let current = '';

  const flush = () => {
    if (current.trim()) {
      parts.push(current.replace(/\n+$/, ''));
    }
    current = '';
  };

  for (const line of text.split('\n')) {
    const candidate = current ? `${current}\n${line}` : line;
    if (candidate.length <= limit) {
      current = candidate;
      continue;
    }

    flush();
    if (line.length <= limit) {
      current = line;
      continue;
    }
    for (let start = 0; start < line.length; start += limit) {
      parts.push(line.slice(start, start + limit));
    }
  }
  flush();

  return parts;
}

/**
 * Chat command grammar.
 *
 * A command is a fixed keyword sequence followed by one argument. A message
 * whose normalized text starts with a command's keywords is an attempt at
 * that command, and is either parsed or rejected with the command's usage.
 */

export type Command =
  | { kind: 'pesa-payment'; amount: number }
  | { kind: 'invalid'; reason: 'format' | 'amount'; command: CommandName }
  | { kind: 'unrecognized' };

export type CommandName = 'pesa-payment';

interface CommandGrammar {
  name: CommandName;
  keywords: readonly string[];
  build(argument: string): Command;
}

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

const GRAMMAR: readonly CommandGrammar[] = [
  {
    name: 'pesa-payment',
    keywords: ['!dm', 'pesa'],
    build(argument) {
      const amount = parseAmount(argument);
      return amount === null
        ? { kind: 'invalid', reason: 'amount', command: 'pesa-payment' }
        : { kind: 'pesa-payment', amount };
    },
  },
];

export function tokenize(text: string): string[] {
  return text.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Remove one matching pair of surrounding single or double quotes.
 */
export function stripQuotes(token: string): string {
  if (token.length >= 2) {
    const first = token[0];
    const last = token[token.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      return token.slice(1, -1);
    }
  }
  return token;
}

/**
 * A finite decimal number, or null. Sign and exponent are accepted so that
 * business rules, not the parser, decide which amounts are allowed.
 */
export function parseAmount(token: string): number | null {
  const text = stripQuotes(token);
  if (!NUMERIC.test(text)) return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

export function parseCommand(body: string): Command {
  const tokens = tokenize(body);
  const normalized = tokens.join(' ').toLowerCase();

  for (const grammar of GRAMMAR) {
    if (!normalized.startsWith(grammar.keywords.join(' '))) continue;

    const keywordsMatch = grammar.keywords.every(
      (keyword, index) => tokens[index]?.toLowerCase() === keyword,
    );
    const argument = tokens[grammar.keywords.length];
    if (!keywordsMatch || argument === undefined) {
      return { kind: 'invalid', reason: 'format', command: grammar.name };
    }
    return grammar.build(argument);
  }

  return { kind: 'unrecognized' };
}

/** Token types; EOF shares antlr4ng's `Token.EOF`. */
export const TokenType = {
  EOF: -1,
  NEWLINE: 1,
  SEMICOLON: 2,
  INT_LITERAL: 3,
  FLOAT_LITERAL: 4,
  STRING_LITERAL: 5,
  JSON_LITERAL: 6,
  IDENTIFIER: 7,
  VERSION: 8,
  VERSION_NUMBER: 9,
  QUBITS: 10,
  MAP: 11,
  VAR: 12,
  ERROR_MODEL: 13,
  CONDITION_PREFIX: 14,
  COMMA: 15,
  COLON: 16,
  DOT: 17,
  LPAREN: 18,
  RPAREN: 19,
  LBRACKET: 20,
  RBRACKET: 21,
  LBRACE: 22,
  RBRACE: 23,
  PIPE: 24,
  AT: 25,
  ASSIGN: 26,
  POWER: 27,
  STAR: 28,
  SLASH: 29,
  PERCENT: 30,
  PLUS: 31,
  MINUS: 32,
  LT: 33,
  LE: 34,
  GT: 35,
  GE: 36,
  EQ: 37,
  NE: 38,
  AND: 39,
  OR: 40,
  NOT: 41,
  TILDE: 42,
} as const;

export type TokenType = (typeof TokenType)[keyof typeof TokenType];

export const KEYWORDS: ReadonlyMap<string, TokenType> = new Map<string, TokenType>([
  ["version", TokenType.VERSION],
  ["qubits", TokenType.QUBITS],
  ["map", TokenType.MAP],
  ["var", TokenType.VAR],
  ["error_model", TokenType.ERROR_MODEL],
]);

/** Punctuation and operators, longest spelling first. */
export const OPERATORS: ReadonlyArray<readonly [string, TokenType]> = [
  ["**", TokenType.POWER],
  ["<=", TokenType.LE],
  [">=", TokenType.GE],
  ["==", TokenType.EQ],
  ["!=", TokenType.NE],
  ["&&", TokenType.AND],
  ["||", TokenType.OR],
  [";", TokenType.SEMICOLON],
  [",", TokenType.COMMA],
  [":", TokenType.COLON],
  [".", TokenType.DOT],
  ["(", TokenType.LPAREN],
  [")", TokenType.RPAREN],
  ["[", TokenType.LBRACKET],
  ["]", TokenType.RBRACKET],
  ["{", TokenType.LBRACE],
  ["}", TokenType.RBRACE],
  ["|", TokenType.PIPE],
  ["@", TokenType.AT],
  ["=", TokenType.ASSIGN],
  ["*", TokenType.STAR],
  ["/", TokenType.SLASH],
  ["%", TokenType.PERCENT],
  ["+", TokenType.PLUS],
  ["-", TokenType.MINUS],
  ["<", TokenType.LT],
  [">", TokenType.GT],
  ["!", TokenType.NOT],
  ["~", TokenType.TILDE],
];

const DISPLAY_NAMES = new Map<number, string>([
  [TokenType.EOF, "end of file"],
  [TokenType.NEWLINE, "newline"],
  [TokenType.INT_LITERAL, "integer literal"],
  [TokenType.FLOAT_LITERAL, "float literal"],
  [TokenType.STRING_LITERAL, "string literal"],
  [TokenType.JSON_LITERAL, "JSON literal"],
  [TokenType.IDENTIFIER, "identifier"],
  [TokenType.VERSION_NUMBER, "version number"],
  [TokenType.CONDITION_PREFIX, "'c-'"],
]);

for (const [spelling, type] of KEYWORDS) {
  DISPLAY_NAMES.set(type, `'${spelling}'`);
}
for (const [spelling, type] of OPERATORS) {
  DISPLAY_NAMES.set(type, `'${spelling}'`);
}

export function tokenDisplayName(type: number): string {
  return DISPLAY_NAMES.get(type) ?? `token ${type}`;
}

const ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  "\\": "\\",
  '"': '"',
  "'": "'",
};

/**
 * Contents of a string literal token. Stops at the closing quote, which may
 * be missing when the literal ran into the end of the input.
 */
export function unescapeString(raw: string): string {
  let value = "";
  for (let i = 1; i < raw.length; i += 1) {
    const ch = raw[i];
    if (ch === '"') {
      break;
    }
    if (ch === "\\" && i + 1 < raw.length) {
      i += 1;
      const escaped = raw[i];
      value += ESCAPES[escaped] ?? escaped;
      continue;
    }
    value += ch;
  }
  return value;
}

/** Raw JSON between the `{|` and `|}` delimiters. */
export function jsonContents(raw: string): string {
  const body = raw.slice(2);
  return body.endsWith("|}") ? body.slice(0, -2) : body;
}

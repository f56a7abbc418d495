/**
 * Position-aware TOML string scanner.
 * Purpose: locate every single-line string value with its full key path and byte span so callers can
 * rewrite one literal without re-serializing the document.
 * Assumptions: input is valid TOML (callers parse it with smol-toml first); multi-line strings are
 * skipped, never reported.
 * Usage: scanStringValues(source) then replaceStringLiterals(source, edits).
 */

// =============================================================================
// TYPES
// =============================================================================

export type TomlQuote = '"' | "'";

export type TomlStringLiteral = {
  value: string;
  /** Offset of the opening quote. */
  start: number;
  /** Offset just past the closing quote. */
  end: number;
  quote: TomlQuote;
};

export type TomlStringSite = {
  path: string[];
  literal: TomlStringLiteral;
};

export type TomlLiteralEdit = {
  literal: TomlStringLiteral;
  value: string;
};

export class TomlScanError extends Error {
  constructor(
    message: string,
    public readonly offset: number,
  ) {
    super(message);
    this.name = "TomlScanError";
  }
}

const BARE_KEY = /[A-Za-z0-9_-]+/y;
const SCALAR_END = /[,\]}#\r\n]/;

const ESCAPES: Record<string, string> = {
  b: "\b",
  t: "\t",
  n: "\n",
  f: "\f",
  r: "\r",
  '"': '"',
  "\\": "\\",
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function scanStringValues(source: string): TomlStringSite[] {
  return new TomlScanner(source).scan();
}

export function replaceStringLiterals(source: string, edits: readonly TomlLiteralEdit[]): string {
  const ordered = [...edits].sort((a, b) => b.literal.start - a.literal.start);
  let out = source;
  for (const edit of ordered) {
    const { start, end, quote } = edit.literal;
    out = out.slice(0, start) + renderLiteral(edit.value, quote) + out.slice(end);
  }
  return out;
}

export function renderLiteral(value: string, quote: TomlQuote): string {
  if (quote === "'" && !value.includes("'") && !/[\r\n]/.test(value)) {
    return `'${value}'`;
  }
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

// =============================================================================
// SCANNER
// =============================================================================

class TomlScanner {
  private pos = 0;
  private tablePath: string[] = [];
  private readonly sites: TomlStringSite[] = [];

  constructor(private readonly src: string) {}

  scan(): TomlStringSite[] {
    while (this.pos < this.src.length) {
      this.skipSpaces();
      const ch = this.src[this.pos];
      if (ch === undefined) break;

      if (ch === "\n" || ch === "\r") {
        this.pos += 1;
      } else if (ch === "#") {
        this.skipComment();
      } else if (ch === "[") {
        this.readHeader();
        this.expectLineEnd();
      } else {
        this.readKeyValue(this.tablePath);
        this.expectLineEnd();
      }
    }
    return this.sites;
  }

  // ---------------------------------------------------------------------------
  // Structure
  // ---------------------------------------------------------------------------

  private readHeader(): void {
    const arrayOfTables = this.src.startsWith("[[", this.pos);
    this.pos += arrayOfTables ? 2 : 1;
    this.skipSpaces();
    const key = this.readKey();
    this.skipSpaces();
    this.expect(arrayOfTables ? "]]" : "]");
    this.tablePath = key;
  }

  private readKeyValue(base: string[]): void {
    const key = this.readKey();
    this.skipSpaces();
    this.expect("=");
    this.skipSpaces();
    this.readValue([...base, ...key]);
  }

  private readKey(): string[] {
    const parts = [this.readSimpleKey()];
    for (;;) {
      this.skipSpaces();
      if (this.src[this.pos] !== ".") break;
      this.pos += 1;
      this.skipSpaces();
      parts.push(this.readSimpleKey());
    }
    return parts;
  }

  private readSimpleKey(): string {
    const ch = this.src[this.pos];
    if (ch === '"') return this.readBasicString().value;
    if (ch === "'") return this.readLiteralString().value;

    BARE_KEY.lastIndex = this.pos;
    const match = BARE_KEY.exec(this.src);
    if (!match) {
      throw new TomlScanError("Expected a key", this.pos);
    }
    this.pos += match[0].length;
    return match[0];
  }

  // ---------------------------------------------------------------------------
  // Values
  // ---------------------------------------------------------------------------

  private readValue(path: string[]): void {
    if (this.src.startsWith('"""', this.pos)) {
      this.skipMultilineString('"');
      return;
    }
    if (this.src.startsWith("'''", this.pos)) {
      this.skipMultilineString("'");
      return;
    }

    const ch = this.src[this.pos];
    if (ch === '"') {
      this.sites.push({ path, literal: this.readBasicString() });
    } else if (ch === "'") {
      this.sites.push({ path, literal: this.readLiteralString() });
    } else if (ch === "{") {
      this.readInlineTable(path);
    } else if (ch === "[") {
      this.readArray(path);
    } else {
      this.readScalar();
    }
  }

  private readInlineTable(path: string[]): void {
    this.pos += 1;
    this.skipSpaces();
    if (this.src[this.pos] === "}") {
      this.pos += 1;
      return;
    }

    for (;;) {
      this.skipSpaces();
      this.readKeyValue(path);
      this.skipSpaces();
      const ch = this.src[this.pos];
      this.pos += 1;
      if (ch === "}") return;
      if (ch !== ",") {
        throw new TomlScanError("Expected , or } in inline table", this.pos - 1);
      }
    }
  }

  private readArray(path: string[]): void {
    this.pos += 1;
    let index = 0;

    for (;;) {
      this.skipBlank();
      if (this.src[this.pos] === "]") {
        this.pos += 1;
        return;
      }

      this.readValue([...path, String(index)]);
      index += 1;
      this.skipBlank();

      const ch = this.src[this.pos];
      this.pos += 1;
      if (ch === "]") return;
      if (ch !== ",") {
        throw new TomlScanError("Expected , or ] in array", this.pos - 1);
      }
    }
  }

  private readScalar(): void {
    const start = this.pos;
    while (this.pos < this.src.length && !SCALAR_END.test(this.src.charAt(this.pos))) {
      this.pos += 1;
    }
    // Trailing spaces belong to the line, not the value.
    while (this.pos > start && /[ \t]/.test(this.src.charAt(this.pos - 1))) {
      this.pos -= 1;
    }
    if (this.pos === start) {
      throw new TomlScanError("Expected a value", start);
    }
  }

  private readBasicString(): TomlStringLiteral {
    const start = this.pos;
    this.pos += 1;
    let value = "";

    for (;;) {
      const ch = this.src[this.pos];
      if (ch === undefined || ch === "\n") {
        throw new TomlScanError("Unterminated string", start);
      }
      if (ch === '"') {
        this.pos += 1;
        return { value, start, end: this.pos, quote: '"' };
      }
      if (ch === "\\") {
        value += this.readEscape();
        continue;
      }
      value += ch;
      this.pos += 1;
    }
  }

  private readEscape(): string {
    const code = this.src.charAt(this.pos + 1);
    const simple = ESCAPES[code];
    if (simple !== undefined) {
      this.pos += 2;
      return simple;
    }

    const width = code === "u" ? 4 : code === "U" ? 8 : 0;
    const hex = this.src.slice(this.pos + 2, this.pos + 2 + width);
    if (width === 0 || !/^[0-9A-Fa-f]+$/.test(hex) || hex.length !== width) {
      throw new TomlScanError(`Invalid escape \\${code}`, this.pos);
    }
    this.pos += 2 + width;
    return String.fromCodePoint(Number.parseInt(hex, 16));
  }

  private readLiteralString(): TomlStringLiteral {
    const start = this.pos;
    const close = this.src.indexOf("'", start + 1);
    const newline = this.src.indexOf("\n", start + 1);
    if (close < 0 || (newline >= 0 && newline < close)) {
      throw new TomlScanError("Unterminated literal string", start);
    }
    this.pos = close + 1;
    return { value: this.src.slice(start + 1, close), start, end: this.pos, quote: "'" };
  }

  private skipMultilineString(quote: TomlQuote): void {
    const start = this.pos;
    this.pos += 3;

    while (this.pos < this.src.length) {
      const ch = this.src[this.pos];
      if (quote === '"' && ch === "\\") {
        this.pos += 2;
        continue;
      }
      if (ch === quote) {
        let run = 0;
        while (this.src[this.pos + run] === quote) run += 1;
        this.pos += run;
        // Up to two quotes may sit right before the closing delimiter.
        if (run >= 3) return;
        continue;
      }
      this.pos += 1;
    }

    throw new TomlScanError("Unterminated multi-line string", start);
  }

  // ---------------------------------------------------------------------------
  // Whitespace
  // ---------------------------------------------------------------------------

  private skipSpaces(): void {
    while (this.src[this.pos] === " " || this.src[this.pos] === "\t") {
      this.pos += 1;
    }
  }

  private skipComment(): void {
    while (this.pos < this.src.length && this.src[this.pos] !== "\n") {
      this.pos += 1;
    }
  }

  // Spaces, newlines and comments, as allowed between array elements.
  private skipBlank(): void {
    for (;;) {
      this.skipSpaces();
      const ch = this.src[this.pos];
      if (ch === "\n" || ch === "\r") {
        this.pos += 1;
      } else if (ch === "#") {
        this.skipComment();
      } else {
        return;
      }
    }
  }

  private expectLineEnd(): void {
    this.skipSpaces();
    if (this.src[this.pos] === "#") this.skipComment();

    const ch = this.src[this.pos];
    if (ch === undefined || ch === "\n") return;
    if (ch === "\r" && this.src[this.pos + 1] === "\n") return;
    throw new TomlScanError("Expected end of line", this.pos);
  }

  private expect(token: string): void {
    if (!this.src.startsWith(token, this.pos)) {
      throw new TomlScanError(`Expected "${token}"`, this.pos);
    }
    this.pos += token.length;
  }
}
